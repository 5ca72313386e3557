import type { KnobRange } from '../types';

export type KnobErrorKind =
    | 'degenerate-angle-range'
    | 'invalid-angle-span'
    | 'degenerate-value-range'
    | 'inverted-value-range'
    | 'invalid-line-width'
    | 'non-finite';

export class KnobConfigurationError extends Error {
    readonly kind: KnobErrorKind;

    readonly range: KnobRange | undefined;

    constructor(kind: KnobErrorKind, message: string, range?: KnobRange) {
        super(message);
        this.name = 'KnobConfigurationError';
        this.kind = kind;
        this.range = range;
    }
}

export const isKnobConfigurationError = (error: unknown): error is KnobConfigurationError =>
    error instanceof KnobConfigurationError;

export interface NormalizedKnobError {
    message: string;
    kind?: KnobErrorKind;
}

export const normalizeKnobError = (error: unknown): NormalizedKnobError => {
    if (isKnobConfigurationError(error)) {
        return {
            message: error.message,
            kind: error.kind,
        };
    }

    if (error instanceof Error) {
        return {
            message: error.message,
        };
    }

    return {
        message: 'Knob update failed',
    };
};
