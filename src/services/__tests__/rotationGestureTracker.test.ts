// @vitest-environment node
import { describe, expect, it } from 'vitest';

import { RotationGestureTracker, angleToPoint } from '../rotationGestureTracker';

const CENTER = { x: 50, y: 50 };

describe('angleToPoint', () => {
    it('measures screen angles from the center', () => {
        expect(angleToPoint({ x: 90, y: 50 }, CENTER)).toBe(0);
        expect(angleToPoint({ x: 50, y: 90 }, CENTER)).toBeCloseTo(Math.PI / 2);
        expect(angleToPoint({ x: 10, y: 50 }, CENTER)).toBeCloseTo(Math.PI);
        expect(angleToPoint({ x: 50, y: 10 }, CENTER)).toBeCloseTo(-Math.PI / 2);
    });
});

describe('RotationGestureTracker', () => {
    it('reports the latest angle through a drag', () => {
        const tracker = new RotationGestureTracker();

        expect(tracker.begin(1, { x: 50, y: 10 }, CENTER)).toEqual({
            phase: 'began',
            touchAngle: -Math.PI / 2,
            moveCount: 0,
        });
        expect(tracker.isTracking).toBe(true);

        expect(tracker.move(1, { x: 90, y: 50 }, CENTER)).toEqual({
            phase: 'changed',
            touchAngle: 0,
            moveCount: 1,
        });
        expect(tracker.touchAngle).toBe(0);

        const moved = tracker.move(1, { x: 50, y: 90 }, CENTER);
        expect(moved?.moveCount).toBe(2);
        expect(moved?.touchAngle).toBeCloseTo(Math.PI / 2);

        const ended = tracker.end(1);
        expect(ended?.phase).toBe('ended');
        expect(ended?.moveCount).toBe(2);
        expect(ended?.touchAngle).toBeCloseTo(Math.PI / 2);
        expect(tracker.isTracking).toBe(false);
        expect(tracker.touchAngle).toBeNull();
    });

    it('ignores a second pointer while a drag is active', () => {
        const tracker = new RotationGestureTracker();
        tracker.begin(1, { x: 90, y: 50 }, CENTER);

        expect(tracker.begin(2, { x: 10, y: 50 }, CENTER)).toBeNull();
        expect(tracker.move(2, { x: 10, y: 50 }, CENTER)).toBeNull();
        expect(tracker.end(2)).toBeNull();
        expect(tracker.touchAngle).toBe(0);
        expect(tracker.isTracking).toBe(true);
    });

    it('ignores moves and ends without a drag', () => {
        const tracker = new RotationGestureTracker();
        expect(tracker.move(1, { x: 90, y: 50 }, CENTER)).toBeNull();
        expect(tracker.end(1)).toBeNull();
        expect(tracker.cancel(1)).toBeNull();
    });

    it('reports cancellation and allows a new drag afterwards', () => {
        const tracker = new RotationGestureTracker();
        tracker.begin(1, { x: 90, y: 50 }, CENTER);
        tracker.move(1, { x: 50, y: 10 }, CENTER);

        expect(tracker.cancel(1)).toEqual({
            phase: 'cancelled',
            touchAngle: -Math.PI / 2,
            moveCount: 1,
        });
        expect(tracker.begin(2, { x: 90, y: 50 }, CENTER)?.phase).toBe('began');
    });

    it('uses the center passed with each sample', () => {
        const tracker = new RotationGestureTracker();
        tracker.begin(1, { x: 90, y: 50 }, CENTER);
        const update = tracker.move(1, { x: 90, y: 50 }, { x: 90, y: 100 });
        expect(update?.touchAngle).toBeCloseTo(-Math.PI / 2);
    });
});
