// Global React 18 act() configuration for Vitest.
// React DOM checks this flag to decide whether to enforce act() usage.
(globalThis as { IS_REACT_ACT_ENVIRONMENT?: boolean }).IS_REACT_ACT_ENVIRONMENT = true;

// jsdom has no PointerEvent; React reads the pointer fields straight off the native event.
if (typeof MouseEvent !== 'undefined' && typeof globalThis.PointerEvent === 'undefined') {
    class MockPointerEvent extends MouseEvent {
        readonly pointerId: number;
        readonly pointerType: string;
        readonly isPrimary: boolean;

        constructor(type: string, init: PointerEventInit = {}) {
            super(type, init);
            this.pointerId = init.pointerId ?? 0;
            this.pointerType = init.pointerType ?? 'mouse';
            this.isPrimary = init.isPrimary ?? true;
        }
    }
    (globalThis as unknown as { PointerEvent: typeof MockPointerEvent }).PointerEvent =
        MockPointerEvent;
}

// jsdom has no pointer capture
if (typeof Element !== 'undefined' && !('setPointerCapture' in Element.prototype)) {
    Object.assign(Element.prototype, {
        setPointerCapture(): void {},
        releasePointerCapture(): void {},
        hasPointerCapture(): boolean {
            return false;
        },
    });
}
