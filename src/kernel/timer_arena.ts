/**
 * timer_arena.ts
 *
 * Every in-flight timer belongs to an owner (widget id). Cancelling a handle
 * sets its tombstone; a callback whose tombstone is set never runs, even if
 * the host timer was already queued.
 */

export interface TimerHandle {
    readonly ownerId: string;
    readonly cancelled: boolean;
    cancel(): void;
}

class ArenaTimer implements TimerHandle {
    public cancelled = false;
    public hostTimer: ReturnType<typeof setTimeout> | null = null;

    constructor(
        public readonly ownerId: string,
        private readonly onCancel: (timer: ArenaTimer) => void
    ) {}

    public cancel(): void {
        if (this.cancelled) return;
        this.cancelled = true;
        if (this.hostTimer !== null) {
            clearTimeout(this.hostTimer);
            this.hostTimer = null;
        }
        this.onCancel(this);
    }
}

/** Raised through a sleeping task when its abort signal fires. */
export class TaskAbortedError extends Error {
    constructor(reason: string) {
        super(`Task aborted: ${reason}`);
        this.name = 'TaskAbortedError';
    }
}

export class TimerArena {
    private timers: Map<string, Set<ArenaTimer>> = new Map();

    /** Run `callback` once after `delayMs` unless cancelled first. */
    public schedule(ownerId: string, delayMs: number, callback: () => void): TimerHandle {
        const timer = this.track(ownerId);
        timer.hostTimer = setTimeout(() => {
            timer.hostTimer = null;
            if (timer.cancelled) return;
            this.untrack(timer);
            timer.cancelled = true;
            callback();
        }, delayMs);
        return timer;
    }

    /**
     * Call `tick` every `intervalMs` until it returns false or the handle is cancelled.
     */
    public repeat(ownerId: string, intervalMs: number, tick: () => boolean): TimerHandle {
        const timer = this.track(ownerId);
        const arm = (): void => {
            timer.hostTimer = setTimeout(() => {
                timer.hostTimer = null;
                if (timer.cancelled) return;
                if (tick() && !timer.cancelled) {
                    arm();
                } else if (!timer.cancelled) {
                    timer.cancelled = true;
                    this.untrack(timer);
                }
            }, intervalMs);
        };
        arm();
        return timer;
    }

    /** Promise-based delay for cooperative tasks. Rejects with TaskAbortedError on abort. */
    public sleep(ownerId: string, delayMs: number, signal?: AbortSignal): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            if (signal?.aborted) {
                reject(new TaskAbortedError(String(signal.reason ?? 'aborted')));
                return;
            }
            const onAbort = (): void => {
                handle.cancel();
                reject(new TaskAbortedError(String(signal?.reason ?? 'aborted')));
            };
            const handle = this.schedule(ownerId, delayMs, () => {
                signal?.removeEventListener('abort', onAbort);
                resolve();
            });
            signal?.addEventListener('abort', onAbort, { once: true });
        });
    }

    /** Tombstone every timer `ownerId` still has in flight. Returns how many were live. */
    public cancelOwner(ownerId: string): number {
        const owned = this.timers.get(ownerId);
        if (!owned) return 0;
        const live = Array.from(owned);
        for (const timer of live) {
            timer.cancel();
        }
        this.timers.delete(ownerId);
        return live.length;
    }

    public pendingCount(ownerId: string): number {
        return this.timers.get(ownerId)?.size ?? 0;
    }

    private track(ownerId: string): ArenaTimer {
        const timer = new ArenaTimer(ownerId, t => this.untrack(t));
        let owned = this.timers.get(ownerId);
        if (!owned) {
            owned = new Set();
            this.timers.set(ownerId, owned);
        }
        owned.add(timer);
        return timer;
    }

    private untrack(timer: ArenaTimer): void {
        const owned = this.timers.get(timer.ownerId);
        if (!owned) return;
        owned.delete(timer);
        if (owned.size === 0) {
            this.timers.delete(timer.ownerId);
        }
    }
}
