/**
 * config_store.ts
 *
 * Key/value settings owned by one widget. Values stay loosely typed at this
 * layer (they arrive from text inputs and rehydrated profiles); each reader
 * sanitizes on the way out.
 */

export enum ChangeOrigin {
    /** An edit the user made: overlays refresh and dependent defaults are derived. */
    User = 'user',
    /** Programmatic rehydration from a saved profile: no side effects. */
    Restore = 'restore',
}

export type ConfigValue = string | number | boolean | null;

export type ConfigChangeListener = (key: string, value: ConfigValue, origin: ChangeOrigin) => void;

export class ConfigStore {
    private values: Map<string, ConfigValue>;
    private listeners: Map<string, Set<ConfigChangeListener>> = new Map();

    constructor(initialValues: Record<string, ConfigValue> = {}) {
        this.values = new Map(Object.entries(initialValues));
    }

    public get(key: string): ConfigValue | undefined {
        return this.values.get(key);
    }

    public has(key: string): boolean {
        return this.values.has(key);
    }

    public set(key: string, value: ConfigValue, origin: ChangeOrigin = ChangeOrigin.User): void {
        this.values.set(key, value);
        this.notify(key, value, origin);
    }

    /** Rehydrate several keys at once; listeners see `ChangeOrigin.Restore`. */
    public restore(values: Record<string, ConfigValue>): void {
        for (const [key, value] of Object.entries(values)) {
            this.set(key, value, ChangeOrigin.Restore);
        }
    }

    public snapshot(): Record<string, ConfigValue> {
        return Object.fromEntries(this.values);
    }

    public subscribe(key: string, listener: ConfigChangeListener): () => void {
        let keyListeners = this.listeners.get(key);
        if (!keyListeners) {
            keyListeners = new Set();
            this.listeners.set(key, keyListeners);
        }
        keyListeners.add(listener);
        return () => {
            this.listeners.get(key)?.delete(listener);
        };
    }

    private notify(key: string, value: ConfigValue, origin: ChangeOrigin): void {
        const keyListeners = this.listeners.get(key);
        if (!keyListeners) return;
        for (const listener of Array.from(keyListeners)) {
            listener(key, value, origin);
        }
    }
}
