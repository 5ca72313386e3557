import { useEffect, useRef, useState } from 'react';

import { TRACK_ANIMATION_DURATION_MS } from '@/constants/knob';
import { buildTrackArcPath, type TrackShape } from '@/overlays';

const easeOutCubic = (progress: number): number => 1 - (1 - progress) ** 3;

const canAnimate = (shape: TrackShape, durationMs: number): boolean =>
    shape.animated && durationMs > 0 && typeof requestAnimationFrame === 'function';

const pathAt = (shape: TrackShape, angle: number): string =>
    buildTrackArcPath({
        bounds: shape.bounds,
        lineWidth: shape.lineWidth,
        startAngle: shape.startAngle,
        currentAngle: angle,
    });

/**
 * Returns the arc path to draw for a track shape, tweening towards the current angle when the
 * renderer was asked to animate. A tween starts from the angle last drawn, so a new target that
 * arrives mid-tween carries on from where the arc is rather than from the previous target.
 */
export const useTrackAnimation = (
    shape: TrackShape,
    durationMs: number = TRACK_ANIMATION_DURATION_MS,
): string => {
    const [frame, setFrame] = useState<{ revision: number; path: string } | null>(null);
    const drawnAngleRef = useRef<number | null>(null);

    useEffect(() => {
        if (!canAnimate(shape, durationMs)) {
            drawnAngleRef.current = shape.currentAngle;
            return;
        }
        const fromAngle = drawnAngleRef.current ?? shape.previousAngle;
        const { currentAngle, revision } = shape;

        let handle = 0;
        let startedAt: number | null = null;
        const step = (timestamp: number) => {
            if (startedAt === null) {
                startedAt = timestamp;
            }
            const progress = Math.min(1, (timestamp - startedAt) / durationMs);
            if (progress >= 1) {
                drawnAngleRef.current = currentAngle;
                setFrame({ revision, path: shape.path });
                return;
            }
            const angle = fromAngle + (currentAngle - fromAngle) * easeOutCubic(progress);
            drawnAngleRef.current = angle;
            setFrame({ revision, path: pathAt(shape, angle) });
            handle = requestAnimationFrame(step);
        };
        handle = requestAnimationFrame(step);

        return () => {
            cancelAnimationFrame(handle);
        };
    }, [shape, durationMs]);

    // Frames left over from an earlier shape never win over the latest one.
    if (frame && frame.revision === shape.revision) {
        return frame.path;
    }
    if (!canAnimate(shape, durationMs)) {
        return shape.path;
    }
    return pathAt(shape, drawnAngleRef.current ?? shape.previousAngle);
};
