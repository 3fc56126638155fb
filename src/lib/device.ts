import { CommandDispatcher } from './commands';
import { EnrollmentManager } from './enrollment';
import { DecodeError, PlayerError, TransportError } from './errors';
import { AttributeName, AttributeSet, IAttributeSink, ILogger, INotificationEnvelope, ITransport, LifecycleState } from './interfaces';
import { err2Str } from './methods';
import { decodeRawNotification, toEnvelope } from './notification';
import { reconcileState, toRawState } from './stateReconciler';
import { findZoneList, reconcileZones, toZoneList } from './zoneReconciler';

/** Attributes which are updated without an info log line */
const QUIET_ATTRIBUTES: readonly AttributeName[] = ['playlists', 'otherzones'];

export interface IDeviceOptions {
    transport: ITransport;
    sink: IAttributeSink;
    log: ILogger;
    commands: CommandDispatcher;
    enrollment: EnrollmentManager;
    /** receives decoded push notifications at debug level, defaults to log */
    apiLog?: ILogger;
    onLifecycleChange?: (state: LifecycleState) => Promise<void>;
}

export interface IInitializeOptions {
    /** 'No' or '12 AM' ... '11 PM' */
    schedulePush: string;
    /** false in poll mode: no enrollment, no schedule */
    push: boolean;
    playlist?: string;
    random?: boolean;
    repeat?: boolean;
}

/**
 * One Volumio player: keeps the last known attributes and funnels polls and
 * push notifications through the reconcilers. Work is executed one task at a time.
 */
export class VolumioDevice {
    public readonly commands: CommandDispatcher;
    public readonly enrollment: EnrollmentManager;
    private readonly transport: ITransport;
    private readonly sink: IAttributeSink;
    private readonly log: ILogger;
    private readonly apiLog: ILogger;
    private readonly onLifecycleChange?: (state: LifecycleState) => Promise<void>;
    private attributes: AttributeSet = {};
    private state: LifecycleState = 'uninitialized';
    private queue: Promise<void> = Promise.resolve();
    private pollTimer: NodeJS.Timeout | undefined;
    private pollBusy = false;

    public constructor(options: IDeviceOptions) {
        this.transport = options.transport;
        this.sink = options.sink;
        this.log = options.log;
        this.commands = options.commands;
        this.enrollment = options.enrollment;
        this.apiLog = options.apiLog ?? options.log;
        this.onLifecycleChange = options.onLifecycleChange;
    }

    public get lifecycle(): LifecycleState {
        return this.state;
    }

    /**
     * Copy of the last known attributes
     */
    public get current(): AttributeSet {
        return { ...this.attributes };
    }

    /**
     * Seed the last known attributes, e.g. from stored states after a restart
     */
    public load(attributes: AttributeSet): void {
        this.attributes = { ...attributes };
    }

    /**
     * Identify the device, (re-)schedule and perform push enrollment, then apply preselections.
     * Every step logs its own failure and the next one runs anyway.
     */
    public async initialize(options: IInitializeOptions): Promise<void> {
        return this.enqueue(async () => {
            await this.setLifecycle('identifying');
            await this.guard('Set device ID', () => this.enrollment.setIdentity());
            if (options.push) {
                await this.setLifecycle('enrolling');
                await this.guard('Schedule push notifications', async () => this.enrollment.schedule(options.schedulePush));
                await this.guard('Enable push notifications', () => this.enrollment.enroll());
            } else {
                this.enrollment.cancel();
            }
            if (options.playlist) await this.commands.dispatch('setPlaylist', options.playlist);
            if (options.random !== undefined) await this.commands.dispatch('random', options.random);
            if (options.repeat !== undefined) await this.commands.dispatch('repeat', options.repeat);
            await this.setLifecycle('idle');
        });
    }

    /**
     * Poll state, zones and playlists
     */
    public async refresh(): Promise<void> {
        return this.enqueue(async () => {
            await this.setLifecycle('reconciling');
            const state = await this.guard('Get state', () => this.transport.get('', 'getState'));
            if (state !== undefined) await this.applyState(state);
            const zones = await this.guard('Get zones', () => this.transport.get('', 'getZones'));
            if (zones !== undefined) await this.applyZones(zones);
            const playlists = await this.guard('List playlists', () => this.commands.listPlaylists());
            if (playlists !== undefined) await this.update('playlists', playlists.join(', '));
            await this.setLifecycle('idle');
        });
    }

    /**
     * Push notification as forwarded raw message ('... body:<base64 JSON>')
     */
    public async handleRawMessage(rawMessage: string): Promise<void> {
        let envelope: INotificationEnvelope;
        try {
            envelope = decodeRawNotification(rawMessage);
        } catch (e) {
            this.log.warn(`Push notification dropped: ${e instanceof DecodeError ? e.message : err2Str(e)}`);
            return;
        }
        return this.handleNotification(envelope);
    }

    /**
     * Push notification as JSON body posted by Volumio
     */
    public async handlePushBody(body: unknown): Promise<void> {
        let envelope: INotificationEnvelope;
        try {
            envelope = toEnvelope(body);
        } catch (e) {
            this.log.warn(`Push notification dropped: ${e instanceof DecodeError ? e.message : err2Str(e)}`);
            return;
        }
        return this.handleNotification(envelope);
    }

    public async handleNotification(envelope: INotificationEnvelope): Promise<void> {
        this.apiLog.debug(`API Debug Push Notification: ${JSON.stringify(envelope)}`);
        if (!envelope.item) {
            this.log.info(`Push Notification: ${JSON.stringify(envelope.data ?? envelope)}`);
            return;
        }
        const data = envelope.data;
        if (envelope.item === 'state') {
            // missing fields reset to 'none', a missing state does not
            if (data === null || typeof data !== 'object' || Array.isArray(data)) {
                this.log.warn(`Push notification dropped: 'state' without state object`);
                return;
            }
            return this.enqueue(async () => {
                await this.setLifecycle('reconciling');
                await this.applyState(data);
                await this.setLifecycle('idle');
            });
        }
        if (envelope.item === 'zones') {
            if (findZoneList(data) === undefined) {
                this.log.warn(`Push notification dropped: 'zones' without zone list`);
                return;
            }
            return this.enqueue(async () => {
                await this.setLifecycle('reconciling');
                await this.applyZones(data);
                await this.setLifecycle('idle');
            });
        }
        this.log.debug(`Push notification '${envelope.item}' ignored`);
    }

    /**
     * Poll with refresh() instead of push notifications. Ticks never overlap.
     * @param intervalMs - poll period
     */
    public startPolling(intervalMs: number): void {
        this.stopPolling();
        this.pollTimer = setInterval(async () => {
            if (this.pollBusy) return;
            this.pollBusy = true;
            try {
                await this.refresh();
            } catch (e) {
                this.log.error(err2Str(e));
            } finally {
                this.pollBusy = false;
            }
        }, intervalMs);
        this.log.debug(`Polling every ${intervalMs} ms`);
    }

    public stopPolling(): void {
        if (this.pollTimer) clearInterval(this.pollTimer);
        this.pollTimer = undefined;
    }

    public get polling(): boolean {
        return this.pollTimer !== undefined;
    }

    /**
     * Stop polling and cancel the enrollment schedule
     */
    public destroy(): void {
        this.stopPolling();
        this.enrollment.cancel();
    }

    private async applyState(json: unknown): Promise<void> {
        const raw = toRawState(json);
        const { next, changed } = reconcileState(this.attributes, raw);
        for (const name of changed) {
            this.log.debug(`${name} oldValue: ${this.attributes[name]} newValue: ${next[name]}`);
        }
        this.attributes = next;
        for (const name of changed) {
            await this.sink.updateAttribute(name, next[name] ?? '', !QUIET_ATTRIBUTES.includes(name));
        }
    }

    private async applyZones(json: unknown): Promise<void> {
        const { next, changed } = reconcileZones(this.attributes.otherzones, toZoneList(json));
        if (changed) await this.update('otherzones', next);
    }

    private async update(name: AttributeName, value: string): Promise<void> {
        if (this.attributes[name] === value) return;
        this.attributes[name] = value;
        await this.sink.updateAttribute(name, value, !QUIET_ATTRIBUTES.includes(name));
    }

    private async setLifecycle(state: LifecycleState): Promise<void> {
        if (this.state === state) return;
        this.log.debug(`Lifecycle: ${this.state} -> ${state}`);
        this.state = state;
        if (this.onLifecycleChange) await this.onLifecycleChange(state);
    }

    /**
     * Run one operation; player errors are logged and yield undefined.
     */
    private async guard<T>(what: string, fn: () => Promise<T>): Promise<T | undefined> {
        try {
            return await fn();
        } catch (e) {
            if (e instanceof TransportError) {
                this.log.error(`${what}: ${e.message}${e.response !== undefined ? ` - response: ${JSON.stringify(e.response)}` : ''}`);
            } else if (e instanceof PlayerError) {
                this.log.warn(`${what}: ${e.message}`);
            } else {
                this.log.error(`${what}: ${err2Str(e)}`);
            }
            return undefined;
        }
    }

    /**
     * Chain a task behind the running one. A failing task is logged and does not block the next.
     */
    private enqueue(task: () => Promise<void>): Promise<void> {
        this.queue = this.queue.then(task).catch((e: unknown) => {
            this.log.error(err2Str(e));
        });
        return this.queue;
    }
}
