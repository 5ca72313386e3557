import { toast } from 'sonner';

import { normalizeKnobError } from '@/utils/knobErrors';

interface SimpleToastProps {
    title: string;
    message: string;
    detail?: string;
    onDismiss: () => void;
}

export function SimpleToast({ title, message, detail, onDismiss }: SimpleToastProps) {
    return (
        <div className="w-[356px] rounded-lg border border-rose-500/50 bg-rose-950 p-4 shadow-lg">
            <div className="flex items-start gap-3">
                <div className="min-w-0 flex-1 text-sm select-text">
                    <div className="font-medium text-rose-100">{title}</div>
                    <p className="mt-1 text-xs text-rose-200/80">{message}</p>
                    {detail ? (
                        <p className="mt-1 font-mono text-[10px] uppercase text-rose-300/60">
                            {detail}
                        </p>
                    ) : null}
                </div>
                <button
                    type="button"
                    onClick={onDismiss}
                    className="flex-none rounded px-1 text-gray-400 hover:bg-gray-800 hover:text-white"
                    aria-label="Dismiss"
                >
                    ×
                </button>
            </div>
        </div>
    );
}

/** Toast for a rejected knob update; accepts whatever the update threw. */
export function showKnobErrorToast(title: string, error: unknown): void {
    const { message, kind } = normalizeKnobError(error);
    toast.custom(
        (toastId) => (
            <SimpleToast
                title={title}
                message={message}
                detail={kind}
                onDismiss={() => toast.dismiss(toastId)}
            />
        ),
        {
            duration: 6_000,
            unstyled: true,
        },
    );
}
