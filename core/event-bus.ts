import { EventEmitter } from 'events';
import type { StopReason } from '../types/comment';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface CrawlProgressData {
    current: number;
    /** 0 when the crawl is uncapped and the post count is unknown */
    target: number;
    action: string;
    page?: number;
}

export interface CrawlCompleteData {
    count: number;
    outputPath: string;
    stopReason: StopReason | null;
}

export interface LogMessageData {
    message: string;
    level: LogLevel;
    timestamp: Date;
}

export const CRAWL_EVENTS = {
    CRAWL_PROGRESS: 'crawl:progress',
    CRAWL_COMPLETE: 'crawl:complete',
    LOG_MESSAGE: 'log:message'
} as const;

export class CrawlerEventBus extends EventEmitter {
    public readonly events = CRAWL_EVENTS;

    emitProgress(data: CrawlProgressData): void {
        this.emit(this.events.CRAWL_PROGRESS, data);
    }

    emitComplete(data: CrawlCompleteData): void {
        this.emit(this.events.CRAWL_COMPLETE, data);
    }

    emitLog(message: string, level: LogLevel = 'info'): void {
        this.emit(this.events.LOG_MESSAGE, { message, level, timestamp: new Date() });
    }

    onProgress(listener: (data: CrawlProgressData) => void): () => void {
        this.on(this.events.CRAWL_PROGRESS, listener);
        return () => this.off(this.events.CRAWL_PROGRESS, listener);
    }

    onLog(listener: (data: LogMessageData) => void): () => void {
        this.on(this.events.LOG_MESSAGE, listener);
        return () => this.off(this.events.LOG_MESSAGE, listener);
    }
}

export function createEventBus(): CrawlerEventBus {
    return new CrawlerEventBus();
}

export default new CrawlerEventBus();
