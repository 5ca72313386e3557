import React, { useMemo, useState } from 'react';

import {
    useLogStore,
    type LogEntry,
    type LogScope,
    type LogSeverity,
} from '../context/LogContext';

interface LogConsoleProps {
    /** Scope shown first; `null` shows every scope. */
    initialScope?: LogScope | null;
    maxEntries?: number;
    title?: string;
}

const SCOPE_FILTERS: Array<{ scope: LogScope | null; label: string }> = [
    { scope: null, label: 'All' },
    { scope: 'knob', label: 'Knob' },
    { scope: 'settings', label: 'Settings' },
];

const SEVERITY_MARKS: Record<LogSeverity, { mark: string; className: string }> = {
    info: { mark: '•', className: 'text-sky-300' },
    warning: { mark: '!', className: 'text-amber-300' },
    error: { mark: '×', className: 'text-red-400' },
};

const formatMetadataValue = (value: unknown): string =>
    typeof value === 'number' ? String(Math.round(value * 1000) / 1000) : String(value);

/** Flattens entry metadata to `key=value` pairs, e.g. `value=0.786`. */
export const formatLogMetadata = (metadata: LogEntry['metadata']): string | null => {
    if (!metadata) {
        return null;
    }
    const pairs = Object.entries(metadata)
        .filter(([, value]) => value !== undefined)
        .map(([key, value]) => `${key}=${formatMetadataValue(value)}`);
    return pairs.length > 0 ? pairs.join(' ') : null;
};

const countErrors = (entries: LogEntry[]): number =>
    entries.reduce((count, entry) => (entry.severity === 'error' ? count + 1 : count), 0);

const LogConsole: React.FC<LogConsoleProps> = ({
    initialScope = null,
    maxEntries = 50,
    title = 'Events',
}) => {
    const { entries, clear } = useLogStore();
    const [scope, setScope] = useState<LogScope | null>(initialScope);

    const scopedEntries = useMemo(
        () => (scope ? entries.filter((entry) => entry.scope === scope) : entries),
        [entries, scope],
    );
    const errorCount = countErrors(scopedEntries);

    return (
        <section className="rounded-lg border border-gray-800 bg-gray-900/60 p-4" aria-label={title}>
            <header className="mb-3 flex items-center gap-3">
                <h2 className="text-lg font-semibold text-gray-100">{title}</h2>
                {errorCount > 0 ? (
                    <span data-testid="log-error-count" className="text-xs text-red-400">
                        {errorCount === 1 ? '1 error' : `${errorCount} errors`}
                    </span>
                ) : null}
                <div role="group" aria-label="Log scope" className="ml-auto flex gap-1">
                    {SCOPE_FILTERS.map((filter) => (
                        <button
                            key={filter.label}
                            type="button"
                            aria-pressed={scope === filter.scope}
                            onClick={() => setScope(filter.scope)}
                            className="rounded px-2 py-0.5 text-xs text-gray-400 aria-pressed:bg-gray-700 aria-pressed:text-white"
                        >
                            {filter.label}
                        </button>
                    ))}
                </div>
                <button
                    type="button"
                    onClick={clear}
                    disabled={entries.length === 0}
                    className="text-xs text-gray-400 hover:text-gray-200 disabled:text-gray-600"
                >
                    Clear
                </button>
            </header>
            {scopedEntries.length === 0 ? (
                <p className="text-sm text-gray-500">No events yet.</p>
            ) : (
                <ol className="flex max-h-60 flex-col gap-1 overflow-y-auto font-mono text-xs">
                    {scopedEntries.slice(0, maxEntries).map((entry) => {
                        const { mark, className } = SEVERITY_MARKS[entry.severity];
                        const detail = formatLogMetadata(entry.metadata);
                        return (
                            <li
                                key={entry.id}
                                data-severity={entry.severity}
                                data-scope={entry.scope}
                                className="flex gap-2"
                            >
                                <span className={className} aria-label={entry.severity}>
                                    {mark}
                                </span>
                                <span className="flex-1 text-gray-200">{entry.message}</span>
                                {detail ? <span className="text-gray-500">{detail}</span> : null}
                            </li>
                        );
                    })}
                </ol>
            )}
        </section>
    );
};

export default LogConsole;
