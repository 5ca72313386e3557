export interface Point {
    x: number;
    y: number;
}

export interface Size {
    width: number;
    height: number;
}

/**
 * Logical configuration and value of a knob. Angles are radians in screen space
 * (0 points right, positive angles turn clockwise because y grows downwards) and are
 * never normalized: the track may extend past ±π.
 */
export interface KnobState {
    value: number;
    minimumValue: number;
    maximumValue: number;
    startAngle: number;
    endAngle: number;
    continuous: boolean;
}

export type KnobRange = Pick<KnobState, 'minimumValue' | 'maximumValue' | 'startAngle' | 'endAngle'>;

export type KnobConfiguration = Omit<KnobState, 'value'> & {
    lineWidth: number;
};

export type KnobPhase = 'idle' | 'dragging';

export interface KnobSnapshot extends KnobConfiguration {
    value: number;
    phase: KnobPhase;
    currentAngle: number;
}

export type KnobValueListener = (value: number) => void;

export interface KnobSettings extends KnobConfiguration {
    /** Whether programmatic updates from the playground animate the track. */
    animate: boolean;
}
