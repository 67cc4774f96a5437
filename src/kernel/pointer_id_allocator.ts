/**
 * pointer_id_allocator.ts
 *
 * Exclusive touch-slot allocation. Each owner (a widget id) holds at most one
 * pointer id at a time, and an id belongs to at most one owner. Slots are
 * handed out lowest-first so traces stay deterministic.
 */

export interface PointerIdAllocatorConfig {
    /** Number of simultaneous touch points the remote surface accepts. */
    maxPointers: number;
}

export class PointerIdAllocator {
    private owners: Map<string, number> = new Map();
    private taken: Set<number> = new Set();
    private config: PointerIdAllocatorConfig;

    constructor(config: Partial<PointerIdAllocatorConfig> = {}) {
        this.config = {
            maxPointers: config.maxPointers ?? 10,
        };
    }

    /**
     * Claim a pointer id for `ownerId`.
     * An owner that already holds an id gets the same id back; `null` means every slot is busy.
     */
    public allocate(ownerId: string): number | null {
        const existing = this.owners.get(ownerId);
        if (existing !== undefined) {
            return existing;
        }
        for (let id = 0; id < this.config.maxPointers; id++) {
            if (!this.taken.has(id)) {
                this.taken.add(id);
                this.owners.set(ownerId, id);
                return id;
            }
        }
        console.warn(`[PointerIds] No free pointer id for ${ownerId} (max ${this.config.maxPointers})`);
        return null;
    }

    /** Returns false when `ownerId` held nothing, so a second release is harmless. */
    public release(ownerId: string): boolean {
        const id = this.owners.get(ownerId);
        if (id === undefined) {
            return false;
        }
        this.owners.delete(ownerId);
        this.taken.delete(id);
        return true;
    }

    public getAllocatedId(ownerId: string): number | null {
        return this.owners.get(ownerId) ?? null;
    }

    public activeCount(): number {
        return this.taken.size;
    }
}
