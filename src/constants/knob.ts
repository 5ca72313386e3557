export const TWO_PI = Math.PI * 2;

export const DEFAULT_START_ANGLE = (-Math.PI * 11) / 8;
export const DEFAULT_END_ANGLE = (Math.PI * 3) / 8;

export const DEFAULT_MINIMUM_VALUE = 0;
export const DEFAULT_MAXIMUM_VALUE = 1;

export const DEFAULT_LINE_WIDTH = 2;
export const MIN_LINE_WIDTH = 0.5;
export const MAX_LINE_WIDTH = 24;

export const DEFAULT_KNOB_SIZE_PX = 200;
export const DEFAULT_TRACK_COLOR = '#22d3ee';

export const TRACK_ANIMATION_DURATION_MS = 200;

export const KNOB_SETTINGS_STORAGE_KEY = 'knob:settings';

export const KNOB_LOG_SCOPE = 'knob';
export const SETTINGS_LOG_SCOPE = 'settings';
