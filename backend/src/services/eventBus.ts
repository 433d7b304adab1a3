import { logger } from "../utils/logger";
import type { FileEntry } from "../types/slskd";

export type SSEEvent =
    | { type: "downloads:update"; userId: string; payload: FileEntry[] }
    | { type: "downloads:finished"; userId: string; payload: { batchId: string; outcome: string } };

type Listener = (event: SSEEvent) => void;

/**
 * In-process fan-out of per-user updates. Listeners filter by userId
 * themselves; a throwing listener does not stop delivery to the others.
 */
class EventBus {
    private readonly listeners = new Set<Listener>();

    emit(event: SSEEvent): void {
        for (const listener of [...this.listeners]) {
            try {
                listener(event);
            } catch (error) {
                logger.error("[EVENTS] Listener failed:", error);
            }
        }
    }

    subscribe(listener: Listener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    listenerCount(): number {
        return this.listeners.size;
    }
}

export { EventBus };
export const eventBus = new EventBus();

/** Publisher bound to one user, as handed to the download pipeline */
export type Publish = (entries: FileEntry[]) => void;

export function publisherFor(bus: EventBus, userId: string): Publish {
    return (entries) => {
        if (entries.length === 0) return;
        bus.emit({ type: "downloads:update", userId, payload: entries });
    };
}
