import { Loader2, AlertCircle, RotateCcw } from 'lucide-react';
import type { DatasetState } from '../hooks/useDatasets';
import { cn } from '../lib/utils';

interface DatasetStatusProps {
    state: Exclude<DatasetState, { status: 'ready' }>;
    onRetry: () => void;
}

/** Full-page notice while the datasets load, or when they could not be loaded. */
export function DatasetStatus({ state, onRetry }: DatasetStatusProps) {
    const isError = state.status === 'error';

    return (
        <div className="container mx-auto p-8 flex justify-center">
            <div
                role={isError ? 'alert' : 'status'}
                className={cn(
                    "flex items-center gap-3 p-4 rounded-lg shadow-sm border border-border bg-card max-w-xl w-full",
                    isError && "border-red-200 bg-red-50 dark:bg-red-950/20"
                )}
            >
                {isError ? (
                    <>
                        <AlertCircle className="h-5 w-5 text-red-500 flex-shrink-0" />
                        <div className="flex-1 text-sm">
                            <p className="font-medium">The datasets could not be loaded.</p>
                            <p className="text-muted-foreground">{state.error.message}</p>
                        </div>
                        <button
                            onClick={onRetry}
                            className="flex items-center gap-1 text-sm font-medium hover:text-primary transition-colors"
                        >
                            <RotateCcw className="h-4 w-4" /> Retry
                        </button>
                    </>
                ) : (
                    <>
                        <Loader2 className="h-5 w-5 animate-spin text-primary" />
                        <span className="text-sm font-medium">Loading water level and rainfall datasets...</span>
                    </>
                )}
            </div>
        </div>
    );
}
