import {
    DEFAULT_END_ANGLE,
    DEFAULT_LINE_WIDTH,
    DEFAULT_MAXIMUM_VALUE,
    DEFAULT_MINIMUM_VALUE,
    DEFAULT_START_ANGLE,
    KNOB_SETTINGS_STORAGE_KEY,
    MAX_LINE_WIDTH,
    MIN_LINE_WIDTH,
} from '../constants/knob';
import { assertValidRange } from '../utils/angleValueMapper';
import { isKnobConfigurationError } from '../utils/knobErrors';

import type { KnobSettings } from '../types';

const CURRENT_VERSION = 1;

interface StoredKnobSettingsV1 {
    version: 1;
    settings: KnobSettings;
}

export const DEFAULT_KNOB_SETTINGS: KnobSettings = {
    minimumValue: DEFAULT_MINIMUM_VALUE,
    maximumValue: DEFAULT_MAXIMUM_VALUE,
    startAngle: DEFAULT_START_ANGLE,
    endAngle: DEFAULT_END_ANGLE,
    lineWidth: DEFAULT_LINE_WIDTH,
    continuous: true,
    animate: false,
};

const isFiniteNumber = (value: unknown): value is number =>
    typeof value === 'number' && Number.isFinite(value);

const clamp = (value: number, min: number, max: number): number =>
    Math.min(max, Math.max(min, value));

const sanitizeNumber = (value: unknown, fallback: number): number =>
    isFiniteNumber(value) ? value : fallback;

const sanitizeBoolean = (value: unknown, fallback: boolean): boolean =>
    typeof value === 'boolean' ? value : fallback;

const readField = (source: object, key: keyof KnobSettings): unknown =>
    key in source ? Reflect.get(source, key) : undefined;

const sanitizeSettings = (input: unknown): KnobSettings | null => {
    if (!input || typeof input !== 'object') {
        return null;
    }
    const base = DEFAULT_KNOB_SETTINGS;

    const range = {
        minimumValue: sanitizeNumber(readField(input, 'minimumValue'), base.minimumValue),
        maximumValue: sanitizeNumber(readField(input, 'maximumValue'), base.maximumValue),
        startAngle: sanitizeNumber(readField(input, 'startAngle'), base.startAngle),
        endAngle: sanitizeNumber(readField(input, 'endAngle'), base.endAngle),
    };
    try {
        assertValidRange(range);
    } catch (error) {
        if (!isKnobConfigurationError(error)) {
            throw error;
        }
        console.warn('Stored knob range is unusable, falling back to defaults', error.kind);
        range.minimumValue = base.minimumValue;
        range.maximumValue = base.maximumValue;
        range.startAngle = base.startAngle;
        range.endAngle = base.endAngle;
    }

    return {
        ...range,
        lineWidth: clamp(
            sanitizeNumber(readField(input, 'lineWidth'), base.lineWidth),
            MIN_LINE_WIDTH,
            MAX_LINE_WIDTH,
        ),
        continuous: sanitizeBoolean(readField(input, 'continuous'), base.continuous),
        animate: sanitizeBoolean(readField(input, 'animate'), base.animate),
    };
};

export const loadKnobSettings = (storage: Storage | undefined): KnobSettings | null => {
    if (!storage) {
        return null;
    }

    const raw = storage.getItem(KNOB_SETTINGS_STORAGE_KEY);
    if (!raw) {
        return null;
    }

    try {
        const parsed: unknown = JSON.parse(raw);
        if (!parsed || typeof parsed !== 'object' || !('version' in parsed)) {
            return null;
        }
        if (parsed.version !== CURRENT_VERSION || !('settings' in parsed)) {
            return null;
        }
        return sanitizeSettings(parsed.settings);
    } catch (error) {
        console.warn('Failed to parse knob settings from storage', error);
        return null;
    }
};

export const persistKnobSettings = (storage: Storage | undefined, settings: KnobSettings): void => {
    if (!storage) {
        return;
    }

    const payload: StoredKnobSettingsV1 = {
        version: CURRENT_VERSION,
        settings,
    };

    try {
        storage.setItem(KNOB_SETTINGS_STORAGE_KEY, JSON.stringify(payload));
    } catch (error) {
        console.warn('Failed to persist knob settings', error);
    }
};

export const getInitialKnobSettings = (storage: Storage | undefined): KnobSettings =>
    loadKnobSettings(storage) ?? DEFAULT_KNOB_SETTINGS;
