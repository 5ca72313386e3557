import React, {
    createContext,
    useCallback,
    useContext,
    useMemo,
    useState,
    type PropsWithChildren,
} from 'react';

import { KNOB_LOG_SCOPE, SETTINGS_LOG_SCOPE } from '@/constants/knob';

export type LogSeverity = 'info' | 'warning' | 'error';

export type LogScope = typeof KNOB_LOG_SCOPE | typeof SETTINGS_LOG_SCOPE;

export interface LogEntry {
    id: string;
    scope: LogScope;
    severity: LogSeverity;
    message: string;
    timestamp: number;
    metadata?: Record<string, unknown>;
}

type AppendLogParams = Omit<LogEntry, 'id' | 'timestamp'> & { timestamp?: number };

interface LogContextValue {
    entries: LogEntry[];
    append: (entry: AppendLogParams) => void;
    clear: () => void;
}

export interface ScopedLogger {
    info: (message: string, metadata?: Record<string, unknown>) => void;
    warning: (message: string, metadata?: Record<string, unknown>) => void;
    error: (message: string, metadata?: Record<string, unknown>) => void;
}

const MAX_LOG_ENTRIES = 200;

const LogContext = createContext<LogContextValue | undefined>(undefined);

const createLogId = (() => {
    let counter = 0;
    return () => {
        counter += 1;
        return `log-${Date.now()}-${counter}`;
    };
})();

export const LogProvider: React.FC<PropsWithChildren> = ({ children }) => {
    const [entries, setEntries] = useState<LogEntry[]>([]);

    const append = useCallback((entry: AppendLogParams) => {
        setEntries((prev) =>
            [
                {
                    ...entry,
                    id: createLogId(),
                    timestamp: entry.timestamp ?? Date.now(),
                },
                ...prev,
            ].slice(0, MAX_LOG_ENTRIES),
        );
    }, []);

    const clear = useCallback(() => setEntries([]), []);

    const value = useMemo<LogContextValue>(
        () => ({ entries, append, clear }),
        [append, clear, entries],
    );

    return <LogContext.Provider value={value}>{children}</LogContext.Provider>;
};

const useLogContext = (): LogContextValue => {
    const context = useContext(LogContext);
    if (!context) {
        throw new Error('useLogStore must be used within a LogProvider');
    }
    return context;
};

export const useLogStore = () => {
    const { entries, clear } = useLogContext();
    return { entries, clear };
};

/** Logger bound to one scope; the returned object is stable across renders. */
export const useScopedLogger = (scope: LogScope): ScopedLogger => {
    const { append } = useLogContext();

    return useMemo<ScopedLogger>(() => {
        const log =
            (severity: LogSeverity) =>
            (message: string, metadata?: Record<string, unknown>) =>
                append({ scope, severity, message, metadata });
        return {
            info: log('info'),
            warning: log('warning'),
            error: log('error'),
        };
    }, [append, scope]);
};
