import type { Point } from '../types';

export type GesturePhase = 'began' | 'changed' | 'ended' | 'cancelled';

export interface GestureUpdate {
    phase: GesturePhase;
    /** Angle from the control's center to the latest pointer position, in (-π, π]. */
    touchAngle: number;
    /** Number of `changed` updates seen so far in this session. */
    moveCount: number;
}

interface DragSession {
    pointerId: number;
    touchAngle: number;
    moveCount: number;
}

export const angleToPoint = (point: Point, center: Point): number =>
    Math.atan2(point.y - center.y, point.x - center.x);

/**
 * Tracks a single-pointer drag around the control's center. Only the latest angle is kept;
 * pointers other than the one that started the session are ignored until it ends.
 */
export class RotationGestureTracker {
    private session: DragSession | null = null;

    public get isTracking(): boolean {
        return this.session !== null;
    }

    public get touchAngle(): number | null {
        return this.session?.touchAngle ?? null;
    }

    public begin(pointerId: number, point: Point, center: Point): GestureUpdate | null {
        if (this.session) {
            return null;
        }
        this.session = {
            pointerId,
            touchAngle: angleToPoint(point, center),
            moveCount: 0,
        };
        return this.toUpdate('began', this.session);
    }

    public move(pointerId: number, point: Point, center: Point): GestureUpdate | null {
        const session = this.session;
        if (!session || session.pointerId !== pointerId) {
            return null;
        }
        session.touchAngle = angleToPoint(point, center);
        session.moveCount += 1;
        return this.toUpdate('changed', session);
    }

    public end(pointerId: number): GestureUpdate | null {
        return this.finish(pointerId, 'ended');
    }

    public cancel(pointerId: number): GestureUpdate | null {
        return this.finish(pointerId, 'cancelled');
    }

    private finish(pointerId: number, phase: 'ended' | 'cancelled'): GestureUpdate | null {
        const session = this.session;
        if (!session || session.pointerId !== pointerId) {
            return null;
        }
        this.session = null;
        return this.toUpdate(phase, session);
    }

    private toUpdate(phase: GesturePhase, session: DragSession): GestureUpdate {
        return {
            phase,
            touchAngle: session.touchAngle,
            moveCount: session.moveCount,
        };
    }
}
