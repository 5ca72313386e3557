import { useState, useSyncExternalStore } from 'react';

import { TrackRenderer } from '@/overlays';
import { KnobController, type KnobControllerOptions } from '@/services/knobController';
import type { KnobSnapshot } from '@/types';

export interface UseKnobControllerResult {
    controller: KnobController;
    renderer: TrackRenderer;
    snapshot: KnobSnapshot;
}

/**
 * Creates a knob controller wired to its track renderer. Options are read once, on mount;
 * later configuration goes through the controller's setters.
 */
export const useKnobController = (
    options: Omit<KnobControllerOptions, 'renderer'> = {},
): UseKnobControllerResult => {
    const [{ controller, renderer }] = useState(() => {
        const trackRenderer = new TrackRenderer();
        return {
            renderer: trackRenderer,
            controller: new KnobController({ ...options, renderer: trackRenderer }),
        };
    });
    const snapshot = useSyncExternalStore(controller.subscribeState, controller.getSnapshot);

    return { controller, renderer, snapshot };
};
