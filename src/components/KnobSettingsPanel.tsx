import React, { useState } from 'react';

import type { KnobConfiguration } from '@/types';

type RangeSettings = Pick<
    KnobConfiguration,
    'minimumValue' | 'maximumValue' | 'startAngle' | 'endAngle' | 'lineWidth'
>;

interface KnobSettingsPanelProps {
    settings: RangeSettings;
    /** Returns an error message when the settings were rejected. */
    onApply: (settings: RangeSettings) => string | null;
}

type DraftKey = keyof RangeSettings;

const FIELDS: Array<{ key: DraftKey; label: string; step: string }> = [
    { key: 'minimumValue', label: 'Minimum', step: 'any' },
    { key: 'maximumValue', label: 'Maximum', step: 'any' },
    { key: 'startAngle', label: 'Start angle (°)', step: '0.5' },
    { key: 'endAngle', label: 'End angle (°)', step: '0.5' },
    { key: 'lineWidth', label: 'Line width', step: '0.5' },
];

const isAngleKey = (key: DraftKey): boolean => key === 'startAngle' || key === 'endAngle';

export const radiansToDegrees = (radians: number): number => (radians * 180) / Math.PI;

export const degreesToRadians = (degrees: number): number => (degrees * Math.PI) / 180;

const formatDraft = (key: DraftKey, value: number): string => {
    const display = isAngleKey(key) ? radiansToDegrees(value) : value;
    return String(Math.round(display * 1000) / 1000);
};

const toDrafts = (settings: RangeSettings): Record<DraftKey, string> => ({
    minimumValue: formatDraft('minimumValue', settings.minimumValue),
    maximumValue: formatDraft('maximumValue', settings.maximumValue),
    startAngle: formatDraft('startAngle', settings.startAngle),
    endAngle: formatDraft('endAngle', settings.endAngle),
    lineWidth: formatDraft('lineWidth', settings.lineWidth),
});

export const parseDrafts = (
    drafts: Record<DraftKey, string>,
): { settings: RangeSettings } | { error: string } => {
    const values: Partial<RangeSettings> = {};
    for (const { key, label } of FIELDS) {
        const raw = drafts[key].trim();
        const parsed = raw === '' ? Number.NaN : Number(raw);
        if (!Number.isFinite(parsed)) {
            return { error: `${label} must be a number` };
        }
        values[key] = isAngleKey(key) ? degreesToRadians(parsed) : parsed;
    }
    const { minimumValue, maximumValue, startAngle, endAngle, lineWidth } = values;
    if (
        minimumValue === undefined ||
        maximumValue === undefined ||
        startAngle === undefined ||
        endAngle === undefined ||
        lineWidth === undefined
    ) {
        return { error: 'All fields are required' };
    }
    return { settings: { minimumValue, maximumValue, startAngle, endAngle, lineWidth } };
};

const KnobSettingsPanel: React.FC<KnobSettingsPanelProps> = ({ settings, onApply }) => {
    const [drafts, setDrafts] = useState<Record<DraftKey, string>>(() => toDrafts(settings));
    const [error, setError] = useState<string | null>(null);

    const handleSubmit = (event: React.FormEvent<HTMLFormElement>) => {
        event.preventDefault();
        const result = parseDrafts(drafts);
        if ('error' in result) {
            setError(result.error);
            return;
        }
        setError(onApply(result.settings));
    };

    const handleReset = () => {
        setDrafts(toDrafts(settings));
        setError(null);
    };

    return (
        <form
            onSubmit={handleSubmit}
            className="flex flex-col gap-3 rounded-md bg-black/20 p-3"
            aria-label="Knob settings"
        >
            <div className="grid grid-cols-2 gap-3">
                {FIELDS.map(({ key, label, step }) => (
                    <label key={key} htmlFor={`knob-${key}`} className="flex flex-col gap-1 text-xs">
                        <span className="font-medium text-gray-400">{label}</span>
                        <input
                            id={`knob-${key}`}
                            type="number"
                            step={step}
                            value={drafts[key]}
                            onChange={(event) =>
                                setDrafts((prev) => ({ ...prev, [key]: event.target.value }))
                            }
                            className="rounded-md border border-gray-600 bg-gray-700 p-2 text-white focus:ring-2 focus:ring-cyan-500 focus:outline-none"
                        />
                    </label>
                ))}
            </div>
            {error ? (
                <div
                    role="alert"
                    className="rounded-md border border-amber-500/50 bg-amber-900/30 px-3 py-2 text-xs text-amber-200"
                >
                    {error}
                </div>
            ) : null}
            <div className="flex gap-2">
                <button
                    type="submit"
                    className="rounded-md bg-cyan-700 px-3 py-1 text-sm text-white hover:bg-cyan-600"
                >
                    Apply
                </button>
                <button
                    type="button"
                    onClick={handleReset}
                    className="rounded-md px-3 py-1 text-sm text-gray-300 hover:bg-gray-800"
                >
                    Reset
                </button>
            </div>
        </form>
    );
};

export default KnobSettingsPanel;
