import type { EventEmitter } from 'events';

/**
 * Process-wide cooperative stop flag.
 * Set from signal handlers, polled by the crawl loops between steps.
 */
let shouldStopScraping = false;

export function setShouldStopScraping(value: boolean): void {
    shouldStopScraping = value;
}

export function getShouldStopScraping(): boolean {
    return shouldStopScraping;
}

export function resetShouldStopScraping(): void {
    shouldStopScraping = false;
}

/**
 * First SIGINT/SIGTERM requests a graceful stop; a second SIGINT exits.
 * Returns a function that removes the handlers.
 */
export function installStopSignalHandlers(
    onStopRequested: (signal: NodeJS.Signals) => void = () => undefined,
    exit: (code: number) => void = (code) => process.exit(code),
    target: EventEmitter = process
): () => void {
    const handler = (signal: NodeJS.Signals): void => {
        if (shouldStopScraping && signal === 'SIGINT') {
            exit(130);
            return;
        }
        setShouldStopScraping(true);
        onStopRequested(signal);
    };

    target.on('SIGINT', handler);
    target.on('SIGTERM', handler);
    return () => {
        target.off('SIGINT', handler);
        target.off('SIGTERM', handler);
    };
}
