/**
 * SVG track renderer.
 *
 * Holds the drawable state of the knob track and rebuilds its arc paths lazily: every
 * mutation only marks the shape for redraw, and `getShape` recomputes it on the next read.
 */
import {
    DEFAULT_END_ANGLE,
    DEFAULT_LINE_WIDTH,
    DEFAULT_START_ANGLE,
    DEFAULT_TRACK_COLOR,
    TWO_PI,
} from '@/constants/knob';
import type { Size } from '@/types';

export interface TrackArcParams {
    bounds: Size;
    lineWidth: number;
    startAngle: number;
    currentAngle: number;
}

export interface TrackShape {
    /** Arc from the start angle to the current angle. */
    path: string;
    /** Full track from the start angle to the end angle. */
    backgroundPath: string;
    color: string;
    lineWidth: number;
    bounds: Size;
    startAngle: number;
    endAngle: number;
    currentAngle: number;
    /** Target of the previous `setCurrentAngle`; where a tween starts if none is running. */
    previousAngle: number;
    animated: boolean;
    revision: number;
}

/** The part of the renderer the knob controller drives. */
export interface TrackRendererPort {
    setCurrentAngle: (angle: number, animated?: boolean) => void;
    setTrackAngles: (startAngle: number, endAngle: number) => void;
    setLineWidth: (lineWidth: number) => void;
}

const formatCoord = (value: number): string => value.toFixed(3);

const polar = (cx: number, cy: number, radius: number, angle: number) => ({
    x: cx + Math.cos(angle) * radius,
    y: cy + Math.sin(angle) * radius,
});

/**
 * Clockwise arc from `startAngle` to `currentAngle`, inset by half the line width so the
 * stroke stays inside the bounds. Returns an empty path when nothing would be drawn.
 */
export const buildTrackArcPath = ({
    bounds,
    lineWidth,
    startAngle,
    currentAngle,
}: TrackArcParams): string => {
    const cx = bounds.width / 2;
    const cy = bounds.height / 2;
    const radius = Math.min(bounds.width, bounds.height) / 2 - lineWidth / 2;
    const sweep = currentAngle - startAngle;
    if (radius <= 0 || !(sweep > 0)) {
        return '';
    }

    const r = formatCoord(radius);
    const start = polar(cx, cy, radius, startAngle);
    const moveTo = `M ${formatCoord(start.x)} ${formatCoord(start.y)}`;

    // An SVG arc cannot end where it starts, so full turns are drawn as two halves.
    if (sweep >= TWO_PI) {
        const half = polar(cx, cy, radius, startAngle + Math.PI);
        return `${moveTo} A ${r} ${r} 0 1 1 ${formatCoord(half.x)} ${formatCoord(half.y)} A ${r} ${r} 0 1 1 ${formatCoord(start.x)} ${formatCoord(start.y)}`;
    }

    const end = polar(cx, cy, radius, currentAngle);
    const largeArc = sweep > Math.PI ? 1 : 0;
    return `${moveTo} A ${r} ${r} 0 ${largeArc} 1 ${formatCoord(end.x)} ${formatCoord(end.y)}`;
};

type ShapeListener = () => void;

export class TrackRenderer implements TrackRendererPort {
    private color = DEFAULT_TRACK_COLOR;

    private lineWidth = DEFAULT_LINE_WIDTH;

    private bounds: Size = { width: 0, height: 0 };

    private startAngle = DEFAULT_START_ANGLE;

    private endAngle = DEFAULT_END_ANGLE;

    private currentAngle = DEFAULT_START_ANGLE;

    private previousAngle = DEFAULT_START_ANGLE;

    private animated = false;

    private needsRedraw = true;

    private revision = 0;

    private shape: TrackShape | null = null;

    private readonly listeners = new Set<ShapeListener>();

    public get isDirty(): boolean {
        return this.needsRedraw;
    }

    public setCurrentAngle = (angle: number, animated = false): void => {
        this.previousAngle = this.currentAngle;
        this.currentAngle = angle;
        this.animated = animated;
        this.invalidate();
    };

    public setTrackAngles = (startAngle: number, endAngle: number): void => {
        if (this.startAngle === startAngle && this.endAngle === endAngle) {
            return;
        }
        this.startAngle = startAngle;
        this.endAngle = endAngle;
        this.settle();
        this.invalidate();
    };

    public setLineWidth = (lineWidth: number): void => {
        if (this.lineWidth === lineWidth) {
            return;
        }
        this.lineWidth = lineWidth;
        this.settle();
        this.invalidate();
    };

    public setColor = (color: string): void => {
        if (this.color === color) {
            return;
        }
        this.color = color;
        this.settle();
        this.invalidate();
    };

    public updateWithBounds = (bounds: Size): void => {
        if (this.bounds.width === bounds.width && this.bounds.height === bounds.height) {
            return;
        }
        this.bounds = { width: bounds.width, height: bounds.height };
        this.settle();
        this.invalidate();
    };

    public subscribe = (listener: ShapeListener): (() => void) => {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    };

    public getShape = (): TrackShape => {
        if (!this.needsRedraw && this.shape) {
            return this.shape;
        }
        this.revision += 1;
        this.shape = {
            path: buildTrackArcPath({
                bounds: this.bounds,
                lineWidth: this.lineWidth,
                startAngle: this.startAngle,
                currentAngle: this.currentAngle,
            }),
            backgroundPath: buildTrackArcPath({
                bounds: this.bounds,
                lineWidth: this.lineWidth,
                startAngle: this.startAngle,
                currentAngle: this.endAngle,
            }),
            color: this.color,
            lineWidth: this.lineWidth,
            bounds: { ...this.bounds },
            startAngle: this.startAngle,
            endAngle: this.endAngle,
            currentAngle: this.currentAngle,
            previousAngle: this.previousAngle,
            animated: this.animated,
            revision: this.revision,
        };
        this.needsRedraw = false;
        return this.shape;
    };

    // Restyling and relayout jump straight to the current angle.
    private settle(): void {
        this.previousAngle = this.currentAngle;
        this.animated = false;
    }

    private invalidate(): void {
        this.needsRedraw = true;
        this.listeners.forEach((listener) => listener());
    }
}
