import {
    DEFAULT_END_ANGLE,
    DEFAULT_LINE_WIDTH,
    DEFAULT_MAXIMUM_VALUE,
    DEFAULT_MINIMUM_VALUE,
    DEFAULT_START_ANGLE,
} from '../constants/knob';
import type { TrackRendererPort } from '../overlays/trackRenderer';
import type {
    KnobConfiguration,
    KnobPhase,
    KnobRange,
    KnobSnapshot,
    KnobState,
    KnobValueListener,
} from '../types';
import {
    angleForValue,
    assertValidRange,
    boundTouchAngle,
    clampValue,
    valueForAngle,
} from '../utils/angleValueMapper';
import { KnobConfigurationError } from '../utils/knobErrors';

import type { GestureUpdate } from './rotationGestureTracker';

export interface KnobControllerOptions extends Partial<KnobConfiguration> {
    value?: number;
    renderer?: TrackRendererPort;
}

type StateListener = () => void;

const assertValidLineWidth = (lineWidth: number): void => {
    if (!Number.isFinite(lineWidth) || lineWidth < 0) {
        throw new KnobConfigurationError(
            'invalid-line-width',
            `Line width must be a finite, non-negative number (got ${lineWidth})`,
        );
    }
};

/**
 * Owns the knob's value and configuration. Gesture updates are reconciled against the track
 * here; value-change listeners hear about gestures only, while state subscribers hear about
 * every mutation.
 */
export class KnobController {
    private state: KnobState;

    private strokeWidth: number;

    private phase: KnobPhase = 'idle';

    private currentAngle: number;

    private snapshot: KnobSnapshot;

    private readonly renderer: TrackRendererPort | null;

    private readonly valueListeners = new Set<KnobValueListener>();

    private readonly stateListeners = new Set<StateListener>();

    constructor(options: KnobControllerOptions = {}) {
        const range: KnobRange = {
            minimumValue: options.minimumValue ?? DEFAULT_MINIMUM_VALUE,
            maximumValue: options.maximumValue ?? DEFAULT_MAXIMUM_VALUE,
            startAngle: options.startAngle ?? DEFAULT_START_ANGLE,
            endAngle: options.endAngle ?? DEFAULT_END_ANGLE,
        };
        assertValidRange(range);
        const lineWidth = options.lineWidth ?? DEFAULT_LINE_WIDTH;
        assertValidLineWidth(lineWidth);

        const initialValue = options.value ?? range.minimumValue;
        if (Number.isNaN(initialValue)) {
            throw new KnobConfigurationError('non-finite', 'Initial knob value must be a number');
        }

        this.state = {
            ...range,
            value: clampValue(initialValue, range.minimumValue, range.maximumValue),
            continuous: options.continuous ?? true,
        };
        this.strokeWidth = lineWidth;
        this.currentAngle = angleForValue(this.state.value, range);
        this.renderer = options.renderer ?? null;
        this.renderer?.setTrackAngles(range.startAngle, range.endAngle);
        this.renderer?.setLineWidth(lineWidth);
        this.renderer?.setCurrentAngle(this.currentAngle, false);
        this.snapshot = this.buildSnapshot();
    }

    public get value(): number {
        return this.state.value;
    }

    public get minimumValue(): number {
        return this.state.minimumValue;
    }

    public get maximumValue(): number {
        return this.state.maximumValue;
    }

    public get startAngle(): number {
        return this.state.startAngle;
    }

    public get endAngle(): number {
        return this.state.endAngle;
    }

    public get continuous(): boolean {
        return this.state.continuous;
    }

    public get lineWidth(): number {
        return this.strokeWidth;
    }

    public get isDragging(): boolean {
        return this.phase === 'dragging';
    }

    public valueForAngle(angle: number): number {
        return valueForAngle(angle, this.state);
    }

    public angleForValue(value: number): number {
        return angleForValue(value, this.state);
    }

    /**
     * Sets the value, clamped into range. Passing the current value exactly is a no-op, even
     * when `animated` differs from the last call.
     */
    public setValue(value: number, animated = false): void {
        if (this.state.value === value) {
            return;
        }
        if (Number.isNaN(value)) {
            throw new KnobConfigurationError('non-finite', 'Knob value must be a number');
        }
        this.state = {
            ...this.state,
            value: clampValue(value, this.state.minimumValue, this.state.maximumValue),
        };
        this.currentAngle = this.angleForValue(this.state.value);
        this.renderer?.setCurrentAngle(this.currentAngle, animated);
        this.publish();
    }

    /**
     * Applies several configuration fields at once. The whole update is validated before
     * anything changes, so a rejected update leaves the knob untouched.
     */
    public configure(update: Partial<KnobConfiguration>): void {
        const range: KnobRange = {
            minimumValue: update.minimumValue ?? this.state.minimumValue,
            maximumValue: update.maximumValue ?? this.state.maximumValue,
            startAngle: update.startAngle ?? this.state.startAngle,
            endAngle: update.endAngle ?? this.state.endAngle,
        };
        assertValidRange(range);
        const lineWidth = update.lineWidth ?? this.strokeWidth;
        assertValidLineWidth(lineWidth);

        this.state = {
            ...range,
            value: clampValue(this.state.value, range.minimumValue, range.maximumValue),
            continuous: update.continuous ?? this.state.continuous,
        };
        this.strokeWidth = lineWidth;

        const nextAngle = angleForValue(this.state.value, range);
        this.renderer?.setTrackAngles(range.startAngle, range.endAngle);
        this.renderer?.setLineWidth(lineWidth);
        if (nextAngle !== this.currentAngle) {
            this.currentAngle = nextAngle;
            this.renderer?.setCurrentAngle(nextAngle, false);
        }
        this.publish();
    }

    public setMinimumValue(minimumValue: number): void {
        this.configure({ minimumValue });
    }

    public setMaximumValue(maximumValue: number): void {
        this.configure({ maximumValue });
    }

    public setStartAngle(startAngle: number): void {
        this.configure({ startAngle });
    }

    public setEndAngle(endAngle: number): void {
        this.configure({ endAngle });
    }

    public setLineWidth(lineWidth: number): void {
        this.configure({ lineWidth });
    }

    public setContinuous(continuous: boolean): void {
        this.configure({ continuous });
    }

    public handleGesture(update: GestureUpdate): void {
        switch (update.phase) {
            case 'began':
                this.setPhase('dragging');
                return;
            case 'changed': {
                this.setPhase('dragging');
                const boundedAngle = boundTouchAngle(
                    update.touchAngle,
                    this.state.startAngle,
                    this.state.endAngle,
                );
                this.setValue(this.valueForAngle(boundedAngle));
                if (this.state.continuous) {
                    this.emitValueChanged();
                }
                return;
            }
            case 'ended':
            case 'cancelled':
                this.setPhase('idle');
                if (!this.state.continuous && update.moveCount > 0) {
                    this.emitValueChanged();
                }
                return;
        }
    }

    /** Listens for value changes made by gestures. */
    public subscribe(listener: KnobValueListener): () => void {
        this.valueListeners.add(listener);
        return () => {
            this.valueListeners.delete(listener);
        };
    }

    public subscribeState = (listener: StateListener): (() => void) => {
        this.stateListeners.add(listener);
        return () => {
            this.stateListeners.delete(listener);
        };
    };

    public getSnapshot = (): KnobSnapshot => this.snapshot;

    private setPhase(phase: KnobPhase): void {
        if (this.phase === phase) {
            return;
        }
        this.phase = phase;
        this.publish();
    }

    private emitValueChanged(): void {
        const value = this.state.value;
        [...this.valueListeners].forEach((listener) => listener(value));
    }

    private buildSnapshot(): KnobSnapshot {
        return {
            ...this.state,
            lineWidth: this.strokeWidth,
            phase: this.phase,
            currentAngle: this.currentAngle,
        };
    }

    private publish(): void {
        this.snapshot = this.buildSnapshot();
        [...this.stateListeners].forEach((listener) => listener());
    }
}
