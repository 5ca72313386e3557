import React, { useCallback, useEffect, useMemo, useState } from 'react';

import { showKnobErrorToast } from '../components/common/StyledToast';
import Knob from '../components/Knob';
import KnobSettingsPanel from '../components/KnobSettingsPanel';
import LogConsole from '../components/LogConsole';
import { KNOB_LOG_SCOPE, SETTINGS_LOG_SCOPE } from '../constants/knob';
import { useScopedLogger } from '../context/LogContext';
import { useKnobController } from '../hooks/useKnobController';
import { getInitialKnobSettings, persistKnobSettings } from '../services/knobSettingsStorage';
import { normalizeKnobError } from '../utils/knobErrors';

import type { KnobConfiguration, KnobSettings } from '../types';

const INITIAL_VALUE_FRACTION = 0.5;

const formatValue = (value: number): string => value.toFixed(2);

interface KnobPlaygroundPageProps {
    storage?: Storage;
    /** Source of randomness for the "random value" button, in [0, 1). */
    random?: () => number;
}

const KnobPlaygroundPage: React.FC<KnobPlaygroundPageProps> = ({ storage, random = Math.random }) => {
    const resolvedStorage = useMemo(
        () => storage ?? (typeof window !== 'undefined' ? window.localStorage : undefined),
        [storage],
    );
    const [settings, setSettings] = useState<KnobSettings>(() =>
        getInitialKnobSettings(resolvedStorage),
    );
    const { controller, renderer, snapshot } = useKnobController({
        ...settings,
        value:
            settings.minimumValue +
            (settings.maximumValue - settings.minimumValue) * INITIAL_VALUE_FRACTION,
    });
    const [notifiedValue, setNotifiedValue] = useState(() => controller.value);
    const knobLog = useScopedLogger(KNOB_LOG_SCOPE);
    const settingsLog = useScopedLogger(SETTINGS_LOG_SCOPE);

    useEffect(
        () =>
            controller.subscribe((value) => {
                setNotifiedValue(value);
                knobLog.info(`Value changed to ${formatValue(value)}`, { value });
            }),
        [controller, knobLog],
    );

    useEffect(() => {
        persistKnobSettings(resolvedStorage, settings);
    }, [resolvedStorage, settings]);

    const setKnobValue = useCallback(
        (value: number) => {
            try {
                controller.setValue(value, settings.animate);
                setNotifiedValue(controller.value);
            } catch (error) {
                knobLog.error(normalizeKnobError(error).message);
                showKnobErrorToast('Could not set value', error);
            }
        },
        [controller, knobLog, settings.animate],
    );

    const handleSliderChange = (event: React.ChangeEvent<HTMLInputElement>) => {
        setKnobValue(Number(event.target.value));
    };

    const handleRandomValue = () => {
        const fraction = Math.floor(random() * 101) / 100;
        const value =
            snapshot.minimumValue + (snapshot.maximumValue - snapshot.minimumValue) * fraction;
        knobLog.info(`Random value ${formatValue(value)}`, { value });
        setKnobValue(value);
    };

    const handleContinuousChange = (event: React.ChangeEvent<HTMLInputElement>) => {
        const continuous = event.target.checked;
        controller.setContinuous(continuous);
        setSettings((prev) => ({ ...prev, continuous }));
        settingsLog.info(`Continuous updates ${continuous ? 'enabled' : 'disabled'}`);
    };

    const handleAnimateChange = (event: React.ChangeEvent<HTMLInputElement>) => {
        const animate = event.target.checked;
        setSettings((prev) => ({ ...prev, animate }));
    };

    const handleApplySettings = (next: Omit<KnobConfiguration, 'continuous'>): string | null => {
        try {
            controller.configure(next);
        } catch (error) {
            const { message, kind } = normalizeKnobError(error);
            settingsLog.error(`Rejected knob settings: ${message}`, { kind });
            showKnobErrorToast('Invalid knob settings', error);
            return message;
        }
        setSettings((prev) => ({ ...prev, ...next }));
        setNotifiedValue(controller.value);
        settingsLog.info('Applied knob settings', { ...next });
        return null;
    };

    // Rotation that keeps the indicator upright at the middle of the track.
    const indicatorRotation =
        controller.angleForValue(snapshot.value) - (snapshot.startAngle + snapshot.endAngle) / 2;
    const sliderStep = (snapshot.maximumValue - snapshot.minimumValue) / 100;

    return (
        <div className="flex flex-col gap-6 p-6 lg:flex-row">
            <section className="flex flex-col items-center gap-4">
                <Knob controller={controller} renderer={renderer} label="Demo knob">
                    <div
                        data-testid="knob-indicator"
                        className="pointer-events-none absolute inset-6 rounded-full border border-gray-600 bg-gray-800"
                        style={{ transform: `rotate(${indicatorRotation}rad)` }}
                    >
                        <div className="mx-auto mt-2 h-6 w-1 rounded bg-cyan-300" />
                    </div>
                </Knob>
                <output
                    data-testid="knob-value"
                    className="font-mono text-3xl text-gray-100"
                    aria-live="polite"
                >
                    {formatValue(notifiedValue)}
                </output>
                <input
                    type="range"
                    aria-label="Knob value"
                    min={snapshot.minimumValue}
                    max={snapshot.maximumValue}
                    step={sliderStep}
                    value={snapshot.value}
                    onChange={handleSliderChange}
                    className="w-64 accent-cyan-400"
                />
                <div className="flex items-center gap-4 text-sm text-gray-300">
                    <label className="flex items-center gap-2">
                        <input
                            type="checkbox"
                            checked={settings.animate}
                            onChange={handleAnimateChange}
                        />
                        Animate
                    </label>
                    <label className="flex items-center gap-2">
                        <input
                            type="checkbox"
                            checked={snapshot.continuous}
                            onChange={handleContinuousChange}
                        />
                        Continuous
                    </label>
                    <button
                        type="button"
                        onClick={handleRandomValue}
                        className="rounded-md bg-gray-700 px-3 py-1 hover:bg-gray-600"
                    >
                        Random value
                    </button>
                </div>
            </section>
            <section className="flex flex-1 flex-col gap-4">
                <KnobSettingsPanel settings={snapshot} onApply={handleApplySettings} />
                <LogConsole />
            </section>
        </div>
    );
};

export default KnobPlaygroundPage;
