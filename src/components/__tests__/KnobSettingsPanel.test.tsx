import { act } from 'react';
import { createRoot } from 'react-dom/client';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { DEFAULT_END_ANGLE, DEFAULT_START_ANGLE } from '../../constants/knob';
import { KnobController } from '../../services/knobController';
import { normalizeKnobError } from '../../utils/knobErrors';
import KnobSettingsPanel, { degreesToRadians, parseDrafts, radiansToDegrees } from '../KnobSettingsPanel';

const SETTINGS = {
    minimumValue: 0,
    maximumValue: 1,
    startAngle: DEFAULT_START_ANGLE,
    endAngle: DEFAULT_END_ANGLE,
    lineWidth: 2,
};

const setInputValue = (input: HTMLInputElement, value: string) => {
    const setter = Object.getOwnPropertyDescriptor(HTMLInputElement.prototype, 'value')?.set;
    setter?.call(input, value);
    input.dispatchEvent(new Event('input', { bubbles: true }));
};

describe('parseDrafts', () => {
    const drafts = {
        minimumValue: '-10',
        maximumValue: '30',
        startAngle: '-90',
        endAngle: '180',
        lineWidth: ' 4 ',
    };

    it('converts angle fields from degrees', () => {
        const result = parseDrafts(drafts);
        expect(result).toEqual({
            settings: {
                minimumValue: -10,
                maximumValue: 30,
                startAngle: degreesToRadians(-90),
                endAngle: degreesToRadians(180),
                lineWidth: 4,
            },
        });
        expect(degreesToRadians(180)).toBeCloseTo(Math.PI);
        expect(radiansToDegrees(Math.PI)).toBeCloseTo(180);
    });

    it('names the first field that is not a number', () => {
        expect(parseDrafts({ ...drafts, minimumValue: '' })).toEqual({
            error: 'Minimum must be a number',
        });
        expect(parseDrafts({ ...drafts, endAngle: 'abc' })).toEqual({
            error: 'End angle (°) must be a number',
        });
    });
});

describe('KnobSettingsPanel', () => {
    let container: HTMLDivElement;
    let root: ReturnType<typeof createRoot>;

    const getInput = (key: string): HTMLInputElement => {
        const input = container.querySelector(`#knob-${key}`);
        if (!(input instanceof HTMLInputElement)) {
            throw new Error(`missing input ${key}`);
        }
        return input;
    };

    const submit = () => {
        act(() => {
            container
                .querySelector('form')
                ?.dispatchEvent(new Event('submit', { bubbles: true, cancelable: true }));
        });
    };

    beforeEach(() => {
        container = document.createElement('div');
        document.body.appendChild(container);
        root = createRoot(container);
    });

    afterEach(() => {
        act(() => {
            root.unmount();
        });
        document.body.removeChild(container);
    });

    it('shows angles in degrees', () => {
        act(() => {
            root.render(<KnobSettingsPanel settings={SETTINGS} onApply={() => null} />);
        });

        expect(getInput('minimumValue').value).toBe('0');
        expect(getInput('startAngle').value).toBe('-247.5');
        expect(getInput('endAngle').value).toBe('67.5');
        expect(getInput('lineWidth').value).toBe('2');
    });

    it('applies edited values and shows a rejection', () => {
        const onApply = vi.fn(
            (_settings: typeof SETTINGS): string | null => 'Minimum value must be below maximum value',
        );
        act(() => {
            root.render(<KnobSettingsPanel settings={SETTINGS} onApply={onApply} />);
        });

        act(() => {
            setInputValue(getInput('minimumValue'), '5');
        });
        submit();

        expect(onApply).toHaveBeenCalledTimes(1);
        const applied = onApply.mock.calls[0]?.[0];
        expect(applied).toMatchObject({ minimumValue: 5, maximumValue: 1, lineWidth: 2 });
        expect(applied?.startAngle).toBeCloseTo(DEFAULT_START_ANGLE);
        expect(applied?.endAngle).toBeCloseTo(DEFAULT_END_ANGLE);
        expect(container.querySelector('[role="alert"]')?.textContent).toBe(
            'Minimum value must be below maximum value',
        );
    });

    it('reports a track the knob refuses', () => {
        const controller = new KnobController();
        const applyToController = (settings: typeof SETTINGS): string | null => {
            try {
                controller.configure(settings);
                return null;
            } catch (error) {
                return normalizeKnobError(error).message;
            }
        };
        act(() => {
            root.render(<KnobSettingsPanel settings={SETTINGS} onApply={applyToController} />);
        });

        act(() => {
            setInputValue(getInput('endAngle'), '-300');
        });
        submit();

        expect(
            container
                .querySelector('[role="alert"]')
                ?.textContent?.startsWith('End angle must lie clockwise within one turn'),
        ).toBe(true);
        expect(controller.endAngle).toBe(DEFAULT_END_ANGLE);
    });

    it('keeps invalid drafts out of onApply and resets them', () => {
        const onApply = vi.fn((_settings: typeof SETTINGS): string | null => null);
        act(() => {
            root.render(<KnobSettingsPanel settings={SETTINGS} onApply={onApply} />);
        });

        act(() => {
            setInputValue(getInput('lineWidth'), '');
        });
        submit();

        expect(onApply).not.toHaveBeenCalled();
        expect(container.querySelector('[role="alert"]')?.textContent).toBe(
            'Line width must be a number',
        );

        const resetButton = Array.from(container.querySelectorAll('button')).find(
            (button) => button.textContent?.trim() === 'Reset',
        );
        act(() => {
            resetButton?.dispatchEvent(new MouseEvent('click', { bubbles: true }));
        });

        expect(getInput('lineWidth').value).toBe('2');
        expect(container.querySelector('[role="alert"]')).toBeNull();
    });
});
