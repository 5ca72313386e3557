import {
    useCallback,
    useRef,
    type MutableRefObject,
    type PointerEvent as ReactPointerEvent,
} from 'react';

import type { KnobController } from '@/services/knobController';
import { RotationGestureTracker } from '@/services/rotationGestureTracker';
import type { Point } from '@/types';

export interface KnobPointerHandlers {
    onPointerDown: (event: ReactPointerEvent<HTMLDivElement>) => void;
    onPointerMove: (event: ReactPointerEvent<HTMLDivElement>) => void;
    onPointerUp: (event: ReactPointerEvent<HTMLDivElement>) => void;
    onPointerCancel: (event: ReactPointerEvent<HTMLDivElement>) => void;
    onLostPointerCapture: (event: ReactPointerEvent<HTMLDivElement>) => void;
}

/**
 * Feeds pointer events on the knob element into a rotation gesture tracker and hands every
 * update to the controller. The element's bounds are measured on each event, so the center
 * follows the control if it is resized mid-drag.
 */
export const useKnobPointerInteractions = (
    controller: KnobController,
): {
    knobRef: MutableRefObject<HTMLDivElement | null>;
    pointerHandlers: KnobPointerHandlers;
} => {
    const knobRef = useRef<HTMLDivElement | null>(null);
    const trackerRef = useRef<RotationGestureTracker | null>(null);

    const getTracker = useCallback((): RotationGestureTracker => {
        if (!trackerRef.current) {
            trackerRef.current = new RotationGestureTracker();
        }
        return trackerRef.current;
    }, []);

    const measure = useCallback(
        (event: ReactPointerEvent<HTMLDivElement>, element: HTMLDivElement) => {
            const rect = element.getBoundingClientRect();
            const point: Point = { x: event.clientX - rect.left, y: event.clientY - rect.top };
            const center: Point = { x: rect.width / 2, y: rect.height / 2 };
            return { point, center };
        },
        [],
    );

    const handlePointerDown = useCallback(
        (event: ReactPointerEvent<HTMLDivElement>) => {
            if (event.button !== 0) {
                return;
            }
            const element = knobRef.current;
            if (!element) {
                return;
            }
            const { point, center } = measure(event, element);
            const update = getTracker().begin(event.pointerId, point, center);
            if (!update) {
                return;
            }
            event.preventDefault();
            element.setPointerCapture(event.pointerId);
            controller.handleGesture(update);
        },
        [controller, getTracker, measure],
    );

    const handlePointerMove = useCallback(
        (event: ReactPointerEvent<HTMLDivElement>) => {
            const element = knobRef.current;
            if (!element) {
                return;
            }
            const { point, center } = measure(event, element);
            const update = getTracker().move(event.pointerId, point, center);
            if (update) {
                controller.handleGesture(update);
            }
        },
        [controller, getTracker, measure],
    );

    const finish = useCallback(
        (event: ReactPointerEvent<HTMLDivElement>, cancelled: boolean) => {
            const tracker = getTracker();
            const update = cancelled
                ? tracker.cancel(event.pointerId)
                : tracker.end(event.pointerId);
            if (!update) {
                return;
            }
            const element = knobRef.current;
            if (element?.hasPointerCapture(event.pointerId)) {
                element.releasePointerCapture(event.pointerId);
            }
            controller.handleGesture(update);
        },
        [controller, getTracker],
    );

    const handlePointerUp = useCallback(
        (event: ReactPointerEvent<HTMLDivElement>) => finish(event, false),
        [finish],
    );

    const handlePointerCancel = useCallback(
        (event: ReactPointerEvent<HTMLDivElement>) => finish(event, true),
        [finish],
    );

    return {
        knobRef,
        pointerHandlers: {
            onPointerDown: handlePointerDown,
            onPointerMove: handlePointerMove,
            onPointerUp: handlePointerUp,
            onPointerCancel: handlePointerCancel,
            // Capture taken away without an up or cancel still ends the session.
            onLostPointerCapture: handlePointerCancel,
        },
    };
};
