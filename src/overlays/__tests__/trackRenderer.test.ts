// @vitest-environment node
import { describe, expect, it, vi } from 'vitest';

import { DEFAULT_START_ANGLE, DEFAULT_TRACK_COLOR } from '../../constants/knob';
import { buildTrackArcPath, TrackRenderer } from '../trackRenderer';

const SQUARE = { width: 100, height: 100 };

describe('buildTrackArcPath', () => {
    it('draws a quarter turn clockwise from the top', () => {
        expect(
            buildTrackArcPath({
                bounds: SQUARE,
                lineWidth: 2,
                startAngle: -Math.PI / 2,
                currentAngle: 0,
            }),
        ).toBe('M 50.000 1.000 A 49.000 49.000 0 0 1 99.000 50.000');
    });

    it('sets the large-arc flag past half a turn', () => {
        expect(
            buildTrackArcPath({
                bounds: SQUARE,
                lineWidth: 2,
                startAngle: -Math.PI / 2,
                currentAngle: Math.PI,
            }),
        ).toBe('M 50.000 1.000 A 49.000 49.000 0 1 1 1.000 50.000');
    });

    it('splits a full turn into two halves', () => {
        expect(
            buildTrackArcPath({
                bounds: SQUARE,
                lineWidth: 2,
                startAngle: -Math.PI / 2,
                currentAngle: 2 * Math.PI,
            }),
        ).toBe(
            'M 50.000 1.000 A 49.000 49.000 0 1 1 50.000 99.000 A 49.000 49.000 0 1 1 50.000 1.000',
        );
    });

    it('centers the arc in non-square bounds using the shorter side', () => {
        expect(
            buildTrackArcPath({
                bounds: { width: 200, height: 100 },
                lineWidth: 4,
                startAngle: 0,
                currentAngle: Math.PI / 2,
            }),
        ).toBe('M 148.000 50.000 A 48.000 48.000 0 0 1 100.000 98.000');
    });

    it('returns an empty path when nothing would be drawn', () => {
        const base = { bounds: SQUARE, lineWidth: 2, startAngle: 0 };
        expect(buildTrackArcPath({ ...base, currentAngle: 0 })).toBe('');
        expect(buildTrackArcPath({ ...base, currentAngle: -1 })).toBe('');
        expect(
            buildTrackArcPath({ ...base, bounds: { width: 0, height: 0 }, currentAngle: 1 }),
        ).toBe('');
        expect(buildTrackArcPath({ ...base, lineWidth: 100, currentAngle: 1 })).toBe('');
    });
});

describe('TrackRenderer', () => {
    it('starts with an empty shape until it has bounds', () => {
        const renderer = new TrackRenderer();
        const shape = renderer.getShape();

        expect(shape.path).toBe('');
        expect(shape.backgroundPath).toBe('');
        expect(shape.color).toBe(DEFAULT_TRACK_COLOR);
        expect(shape.revision).toBe(1);
        expect(renderer.isDirty).toBe(false);
    });

    it('caches the shape until something changes', () => {
        const renderer = new TrackRenderer();
        const first = renderer.getShape();

        expect(renderer.getShape()).toBe(first);

        renderer.updateWithBounds(SQUARE);
        expect(renderer.isDirty).toBe(true);
        const second = renderer.getShape();
        expect(second).not.toBe(first);
        expect(second.revision).toBe(2);
    });

    it('notifies subscribers on changes and skips unchanged values', () => {
        const renderer = new TrackRenderer();
        const listener = vi.fn();
        const unsubscribe = renderer.subscribe(listener);

        renderer.updateWithBounds(SQUARE);
        renderer.updateWithBounds({ ...SQUARE });
        renderer.setLineWidth(2);
        renderer.setColor(DEFAULT_TRACK_COLOR);
        expect(listener).toHaveBeenCalledTimes(1);

        renderer.setColor('#f97316');
        expect(listener).toHaveBeenCalledTimes(2);

        unsubscribe();
        renderer.setLineWidth(6);
        expect(listener).toHaveBeenCalledTimes(2);
    });

    it('builds the value arc and the background track', () => {
        const renderer = new TrackRenderer();
        renderer.updateWithBounds(SQUARE);
        renderer.setTrackAngles(-Math.PI / 2, Math.PI);
        renderer.setCurrentAngle(0, true);

        const shape = renderer.getShape();

        expect(shape.path).toBe('M 50.000 1.000 A 49.000 49.000 0 0 1 99.000 50.000');
        expect(shape.backgroundPath).toBe('M 50.000 1.000 A 49.000 49.000 0 1 1 1.000 50.000');
        expect(shape.animated).toBe(true);
        expect(shape.previousAngle).toBe(DEFAULT_START_ANGLE);
        expect(shape.currentAngle).toBe(0);
    });

    it('remembers the previous angle for animation', () => {
        const renderer = new TrackRenderer();
        renderer.setCurrentAngle(0.5);
        renderer.setCurrentAngle(1, true);

        expect(renderer.getShape()).toMatchObject({
            previousAngle: 0.5,
            currentAngle: 1,
            animated: true,
        });
    });

    it('drops a pending animation when restyled', () => {
        const renderer = new TrackRenderer();
        renderer.setCurrentAngle(1, true);
        renderer.setColor('#f97316');

        expect(renderer.getShape()).toMatchObject({
            previousAngle: 1,
            currentAngle: 1,
            animated: false,
            color: '#f97316',
        });
    });
});
