/**
 * Knob track rendering: SVG arc paths and the renderer the controller drives.
 */

export { buildTrackArcPath, TrackRenderer } from './trackRenderer';

export type { TrackArcParams, TrackRendererPort, TrackShape } from './trackRenderer';
