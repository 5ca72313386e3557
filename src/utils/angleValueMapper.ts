/**
 * Conversions between knob values and track angles.
 *
 * All angles are unnormalized radians. `atan2` only ever yields angles in (-π, π], while a
 * track such as the default [-11π/8, 3π/8] reaches past -π, so raw touch angles are first
 * wrapped against the midpoint of the gap before they are compared with the track.
 */

import { TWO_PI } from '@/constants/knob';
import type { KnobRange } from '@/types';

import { KnobConfigurationError } from './knobErrors';

const describeRange = (range: KnobRange): string =>
    `value [${range.minimumValue}, ${range.maximumValue}], angle [${range.startAngle}, ${range.endAngle}]`;

/**
 * Throws a {@link KnobConfigurationError} unless the range can be mapped both ways and
 * still hold `minimumValue <= value <= maximumValue`. The track runs clockwise from
 * `startAngle` to `endAngle` and covers less than a full turn, so that a gap is left for
 * touch angles to wrap around.
 */
export const assertValidRange = (range: KnobRange): void => {
    const { minimumValue, maximumValue, startAngle, endAngle } = range;
    if (![minimumValue, maximumValue, startAngle, endAngle].every(Number.isFinite)) {
        throw new KnobConfigurationError(
            'non-finite',
            `Knob range must be finite (${describeRange(range)})`,
            range,
        );
    }
    if (startAngle === endAngle) {
        throw new KnobConfigurationError(
            'degenerate-angle-range',
            `Start and end angle must differ (${describeRange(range)})`,
            range,
        );
    }
    const span = endAngle - startAngle;
    if (span < 0 || span >= TWO_PI) {
        throw new KnobConfigurationError(
            'invalid-angle-span',
            `End angle must lie clockwise within one turn of the start angle (${describeRange(range)})`,
            range,
        );
    }
    if (minimumValue === maximumValue) {
        throw new KnobConfigurationError(
            'degenerate-value-range',
            `Minimum and maximum value must differ (${describeRange(range)})`,
            range,
        );
    }
    if (minimumValue > maximumValue) {
        throw new KnobConfigurationError(
            'inverted-value-range',
            `Minimum value must be below maximum value (${describeRange(range)})`,
            range,
        );
    }
};

export const clampValue = (value: number, minimumValue: number, maximumValue: number): number =>
    Math.min(maximumValue, Math.max(minimumValue, value));

/** Linear map from the track to the value range. Out-of-track angles are not clamped. */
export const valueForAngle = (angle: number, range: KnobRange): number => {
    assertValidRange(range);
    const angleRange = range.endAngle - range.startAngle;
    const valueRange = range.maximumValue - range.minimumValue;
    return ((angle - range.startAngle) / angleRange) * valueRange + range.minimumValue;
};

export const angleForValue = (value: number, range: KnobRange): number => {
    assertValidRange(range);
    const angleRange = range.endAngle - range.startAngle;
    const valueRange = range.maximumValue - range.minimumValue;
    return ((value - range.minimumValue) / valueRange) * angleRange + range.startAngle;
};

/** Midpoint of the gap left between `endAngle` and `startAngle` going clockwise. */
export const gapMidpointAngle = (startAngle: number, endAngle: number): number =>
    (TWO_PI + startAngle - endAngle) / 2 + endAngle;

/**
 * Picks the representative of `touchAngle` (mod 2π) lying in (midPoint - 2π, midPoint].
 * A touch exactly on the midpoint is kept as is, so it always lands past `endAngle`.
 */
export const normalizeTouchAngle = (touchAngle: number, midPoint: number): number => {
    if (touchAngle > midPoint) {
        return touchAngle - TWO_PI;
    }
    if (touchAngle < midPoint - TWO_PI) {
        return touchAngle + TWO_PI;
    }
    return touchAngle;
};

export const boundTouchAngle = (touchAngle: number, startAngle: number, endAngle: number): number => {
    const normalized = normalizeTouchAngle(touchAngle, gapMidpointAngle(startAngle, endAngle));
    return Math.min(endAngle, Math.max(startAngle, normalized));
};
