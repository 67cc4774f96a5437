import { EventBus } from './event_bus';
import { PointerIdAllocator } from './pointer_id_allocator';
import { TimerArena } from './timer_arena';
import type { SurfaceSize } from './types';

export interface PluginContext {
    eventBus: EventBus;
    pointerIds: PointerIdAllocator;
    timers: TimerArena;
    surface: SurfaceSize;
}

export interface Plugin {
    name: string;
    version: string;

    // Lifecycle methods
    init(context: PluginContext): Promise<void> | void;
    start(): Promise<void> | void;
    stop(): Promise<void> | void;
    destroy(): Promise<void> | void;
}

// ── Lifecycle FSM ──────────────────────────────────────────────────────────────
//
// Valid transitions:
//   CREATED     → initAll()    → INITIALIZED
//   INITIALIZED → startAll()   → RUNNING      (interactive mapping mode)
//   RUNNING     → stopAll()    → STOPPED      (edit mode: in-flight gestures are cancelled)
//   STOPPED     → startAll()   → RUNNING
//   any state   → destroyAll() → DESTROYED
//   DESTROYED   → (terminal)
//
// removePlugin() tears down a single widget in any non-terminal state.

export type SupervisorState = 'CREATED' | 'INITIALIZED' | 'RUNNING' | 'STOPPED' | 'DESTROYED';

/** Thrown when a PluginSupervisor lifecycle method is called in the wrong state. */
export class LifecycleGateError extends Error {
    constructor(method: string, current: SupervisorState, allowed: SupervisorState[]) {
        super(
            `[Supervisor] LIFECYCLE GATE: ${method}() requires state ${allowed.join(' or ')},` +
            ` but supervisor is in state ${current}.\n` +
            `  Correct call order: registerPlugin() → initAll() → startAll() → stopAll() → destroyAll().`
        );
        this.name = 'LifecycleGateError';
    }
}

export class PluginSupervisor {
    private plugins: Map<string, Plugin> = new Map();
    private context: PluginContext;
    private state: SupervisorState = 'CREATED';

    constructor(surface: SurfaceSize, overrides: Partial<Omit<PluginContext, 'surface'>> = {}) {
        this.context = {
            eventBus: overrides.eventBus ?? new EventBus(),
            pointerIds: overrides.pointerIds ?? new PointerIdAllocator(),
            timers: overrides.timers ?? new TimerArena(),
            surface: { ...surface },
        };
    }

    public getContext(): PluginContext {
        return this.context;
    }

    public getEventBus(): EventBus {
        return this.context.eventBus;
    }

    public getState(): SupervisorState {
        return this.state;
    }

    public getPlugin(name: string): Plugin | undefined {
        return this.plugins.get(name);
    }

    public registerPlugin(plugin: Plugin): void {
        if (this.state !== 'CREATED') {
            throw new LifecycleGateError(`registerPlugin('${plugin.name}')`, this.state, ['CREATED']);
        }
        if (this.plugins.has(plugin.name)) {
            throw new Error(`[Supervisor] DUPLICATE PLUGIN: '${plugin.name}' is already registered.`);
        }
        this.plugins.set(plugin.name, plugin);
        console.log(`[Supervisor] Registered plugin: ${plugin.name} v${plugin.version}`);
    }

    public async initAll(): Promise<void> {
        if (this.state !== 'CREATED') {
            throw new LifecycleGateError('initAll', this.state, ['CREATED']);
        }
        console.log(`[Supervisor] Initializing ${this.plugins.size} plugins...`);
        for (const plugin of Array.from(this.plugins.values())) {
            try {
                await plugin.init(this.context);
            } catch (error) {
                console.error(`[Supervisor] Failed to initialize plugin: ${plugin.name}`, error);
                // Fail-closed: a half-initialized widget set never reaches RUNNING.
                throw error;
            }
        }
        this.state = 'INITIALIZED';
    }

    public async startAll(): Promise<void> {
        if (this.state !== 'INITIALIZED' && this.state !== 'STOPPED') {
            throw new LifecycleGateError('startAll', this.state, ['INITIALIZED', 'STOPPED']);
        }
        for (const plugin of Array.from(this.plugins.values())) {
            try {
                await plugin.start();
            } catch (error) {
                console.error(`[Supervisor] Failed to start plugin: ${plugin.name}`, error);
                throw error;
            }
        }
        this.state = 'RUNNING';
        console.log(`[Supervisor] Mapping mode on (${this.plugins.size} widgets)`);
    }

    public async stopAll(): Promise<void> {
        if (this.state !== 'RUNNING') {
            throw new LifecycleGateError('stopAll', this.state, ['RUNNING']);
        }
        const reversed = Array.from(this.plugins.values()).reverse();
        for (const plugin of reversed) {
            try {
                await plugin.stop();
            } catch (error) {
                // Non-fatal: keep stopping the remaining widgets.
                console.error(`[Supervisor] Failed to stop plugin: ${plugin.name}`, error);
            }
        }
        this.state = 'STOPPED';
        console.log('[Supervisor] Mapping mode off');
    }

    /** Destroy and forget a single widget. Returns false when no such widget is registered. */
    public async removePlugin(name: string): Promise<boolean> {
        if (this.state === 'DESTROYED') {
            throw new LifecycleGateError(`removePlugin('${name}')`, this.state,
                ['CREATED', 'INITIALIZED', 'RUNNING', 'STOPPED']);
        }
        const plugin = this.plugins.get(name);
        if (!plugin) return false;
        this.plugins.delete(name);
        if (this.state !== 'CREATED') {
            await plugin.destroy();
        }
        console.log(`[Supervisor] Removed plugin: ${name}`);
        return true;
    }

    public async destroyAll(): Promise<void> {
        if (this.state === 'DESTROYED') {
            console.warn('[Supervisor] destroyAll() called on an already-DESTROYED supervisor; ignoring.');
            return;
        }
        const reversed = Array.from(this.plugins.values()).reverse();
        for (const plugin of reversed) {
            try {
                await plugin.destroy();
            } catch (error) {
                console.error(`[Supervisor] Failed to destroy plugin: ${plugin.name}`, error);
            }
        }
        this.plugins.clear();
        this.state = 'DESTROYED';
        console.log('[Supervisor] Destroyed');
    }
}
