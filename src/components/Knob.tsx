import React, { useLayoutEffect, useSyncExternalStore, type ReactNode } from 'react';

import { DEFAULT_KNOB_SIZE_PX, DEFAULT_TRACK_COLOR } from '@/constants/knob';
import { useKnobPointerInteractions } from '@/hooks/useKnobPointerInteractions';
import { useTrackAnimation } from '@/hooks/useTrackAnimation';
import type { TrackRenderer } from '@/overlays';
import type { KnobController } from '@/services/knobController';

interface KnobProps {
    controller: KnobController;
    renderer: TrackRenderer;
    size?: number;
    color?: string;
    label?: string;
    /** Drawn above the track, e.g. a rotating indicator. */
    children?: ReactNode;
}

const Knob: React.FC<KnobProps> = ({
    controller,
    renderer,
    size = DEFAULT_KNOB_SIZE_PX,
    color = DEFAULT_TRACK_COLOR,
    label = 'Knob',
    children,
}) => {
    const snapshot = useSyncExternalStore(controller.subscribeState, controller.getSnapshot);
    const shape = useSyncExternalStore(renderer.subscribe, renderer.getShape);
    const arcPath = useTrackAnimation(shape);
    const { knobRef, pointerHandlers } = useKnobPointerInteractions(controller);

    useLayoutEffect(() => {
        renderer.updateWithBounds({ width: size, height: size });
    }, [renderer, size]);

    useLayoutEffect(() => {
        renderer.setColor(color);
    }, [renderer, color]);

    return (
        <div
            ref={knobRef}
            role="slider"
            aria-label={label}
            aria-valuemin={snapshot.minimumValue}
            aria-valuemax={snapshot.maximumValue}
            aria-valuenow={snapshot.value}
            data-phase={snapshot.phase}
            className="relative cursor-grab touch-none select-none data-[phase=dragging]:cursor-grabbing"
            style={{ width: size, height: size }}
            {...pointerHandlers}
        >
            <svg
                width={size}
                height={size}
                viewBox={`0 0 ${size} ${size}`}
                className="pointer-events-none absolute inset-0"
            >
                <path
                    data-testid="knob-track"
                    d={shape.backgroundPath}
                    fill="none"
                    stroke={shape.color}
                    strokeOpacity={0.2}
                    strokeWidth={shape.lineWidth}
                />
                <path
                    data-testid="knob-arc"
                    d={arcPath}
                    fill="none"
                    stroke={shape.color}
                    strokeWidth={shape.lineWidth}
                    strokeLinecap="round"
                />
            </svg>
            {children}
        </div>
    );
};

export default Knob;
