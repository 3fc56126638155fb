/**
 * -------------------------------------------------------------------
 *
 *  ioBroker Volumio Player Adapter
 *
 *  Mirrors the state of a Volumio music player into ioBroker states
 *  and translates command states into Volumio REST API calls.
 *
 * @license Apache License 2.0
 *
 * -------------------------------------------------------------------
 */

import * as utils from '@iobroker/adapter-core';
import type { Server } from 'node:http';
import { CommandDispatcher, isCommandName } from './lib/commands';
import { normalizeConfig, toPreselection } from './lib/config';
import { VolumioDevice } from './lib/device';
import { EnrollmentManager } from './lib/enrollment';
import { ArpIdentityResolver } from './lib/identity';
import { ATTRIBUTE_NAMES, AttributeName, AttributeSet, IAttributeSink, ILogger, LifecycleState } from './lib/interfaces';
import { err2Str, getLocalIp } from './lib/methods';
import { createPushApp, listenPushApp } from './lib/pushServer';
import { VolumioTransport } from './lib/transport';

/**
 * Command states: button commands are triggered by any value, the others take the written value as argument.
 */
const COMMAND_STATES: { [k: string]: { name: string; type: ioBroker.CommonType; role: string; min?: number; max?: number } } = {
    play: { name: 'Play', type: 'boolean', role: 'button.play' },
    pause: { name: 'Pause', type: 'boolean', role: 'button.pause' },
    stop: { name: 'Stop', type: 'boolean', role: 'button.stop' },
    nextTrack: { name: 'Next track', type: 'boolean', role: 'button.next' },
    previousTrack: { name: 'Previous track', type: 'boolean', role: 'button.prev' },
    clearQueue: { name: 'Clear queue', type: 'boolean', role: 'button' },
    mute: { name: 'Mute', type: 'boolean', role: 'button' },
    unmute: { name: 'Unmute', type: 'boolean', role: 'button' },
    volumeUp: { name: 'Volume up', type: 'boolean', role: 'button.volume.up' },
    volumeDown: { name: 'Volume down', type: 'boolean', role: 'button.volume.down' },
    setVolume: { name: 'Set volume (0-100)', type: 'number', role: 'level.volume', min: 0, max: 100 },
    setLevel: { name: 'Set level, same as set volume', type: 'number', role: 'level.volume', min: 0, max: 100 },
    repeat: { name: 'Repeat: empty to toggle, "true" or "false"', type: 'string', role: 'text' },
    random: { name: 'Random: empty to toggle, "true" or "false"', type: 'string', role: 'text' },
    setPlaylist: { name: 'Play playlist (case sensitive name)', type: 'string', role: 'text' },
    setTrack: { name: 'Add to queue: {"uri": "...", "service": "...", "title": "..."}', type: 'string', role: 'json' },
    playTrack: { name: 'Replace queue and play: {"uri": "...", "service": "...", "title": "..."}', type: 'string', role: 'json' },
    playText: { name: 'Play text (not enabled)', type: 'string', role: 'text' },
    restoreTrack: { name: 'Restore track (not enabled)', type: 'string', role: 'text' },
    resumeTrack: { name: 'Resume track (not enabled)', type: 'string', role: 'text' },
    refresh: { name: 'Refresh state, zones and playlists', type: 'boolean', role: 'button' },
    initialize: { name: 'Initialize: device ID, schedule and push enrollment', type: 'boolean', role: 'button' },
    enablePushNotifications: { name: 'Enroll in push notifications', type: 'boolean', role: 'button' },
};

/**
 * Main Adapter Class
 * @class VolumioPlayer
 */
export class VolumioPlayer extends utils.Adapter implements IAttributeSink {
    public device: VolumioDevice | undefined;
    private server: Server | undefined;

    public err2Str = err2Str;

    /**
     * Constructor
     */
    public constructor(options: Partial<utils.AdapterOptions> = {}) {
        super({ ...options, name: 'volumio-player' });
        this.on('ready', this._asyncOnReady.bind(this));
        this.on('stateChange', this._asyncOnStateChange.bind(this));
        this.on('unload', this._onUnload.bind(this));
    }

    /**
     * _asyncOnReady
     * Called once ioBroker databases are connected and adapter received configuration.
     */
    private async _asyncOnReady(): Promise<void> {
        try {
            await this.setStateAsync('info.connection', { val: false, ack: true });

            // Prepare config
            Object.assign(this.config, normalizeConfig(this.config, this.log));

            // Create objects/states, if not existing
            if (!(await this.createObjectsAsync())) throw 'Failed to create objects with createObjectsAsync()';

            const log = this.deviceLogger(this.config.debugOutput);
            const apiLog = this.deviceLogger(this.config.apiDebugOutput);
            const transport = new VolumioTransport({
                host: this.config.host,
                log: apiLog,
                onConnectionChange: async (connected: boolean) => {
                    await this.setStateChangedAsync('info.connection', { val: connected, ack: true });
                },
            });
            const callbackUrl = `http://${this.config.callbackHost || getLocalIp()}:${this.config.pushPort}`;
            const enrollment = new EnrollmentManager({
                transport,
                sink: this,
                resolver: new ArpIdentityResolver(),
                log,
                callbackUrl,
                onScheduledRun: async (next: number) => {
                    await this.setStateAsync('info.nextEnrollment', { val: next, ack: true });
                },
            });
            this.device = new VolumioDevice({
                transport,
                sink: this,
                log,
                commands: new CommandDispatcher(transport, log),
                enrollment,
                apiLog,
                onLifecycleChange: async (state: LifecycleState) => {
                    await this.setStateChangedAsync('info.lifecycle', { val: state, ack: true });
                },
            });

            // Last known values, so a restart does not re-emit unchanged attributes
            const stored: AttributeSet = {};
            for (const name of ATTRIBUTE_NAMES) {
                const state = await this.getStateAsync(`player.${name}`);
                if (state && typeof state.val === 'string') stored[name] = state.val;
            }
            this.device.load(stored);

            // Subscribe to command states
            await this.subscribeStatesAsync('commands.*');

            if (this.config.mode === 'push') {
                const device = this.device;
                // only the Volumio host resolved by the device identification may push
                const app = createPushApp({ receiver: device, log: this.log, source: () => device.enrollment.hostAddress });
                this.server = await listenPushApp(app, this.config.pushPort, this.log);
            }
            await this.device.initialize({
                schedulePush: this.config.schedulePush,
                push: this.config.mode === 'push',
                playlist: this.config.playlist || undefined,
                random: toPreselection(this.config.random),
                repeat: toPreselection(this.config.repeat),
            });
            await this.setStateAsync('info.nextEnrollment', { val: this.device.enrollment.nextEnrollment(), ack: true });
            await this.device.refresh();
            if (this.config.mode === 'poll') this.device.startPolling(this.config.pollInterval * 1000);

            // Final message
            this.log.info(`Volumio player ${this.config.host} initialized in ${this.config.mode} mode`);
        } catch (e) {
            this.log.error(this.err2Str(e));
            return;
        }
    }

    /**
     * Logger for the player library, debug level only if enabled
     * @param debug - debugOutput for general messages, apiDebugOutput for API responses
     */
    private deviceLogger(debug: boolean): ILogger {
        return {
            debug: (msg: string) => {
                if (debug) this.log.debug(msg);
            },
            info: (msg: string) => this.log.info(msg),
            warn: (msg: string) => this.log.warn(msg),
            error: (msg: string) => this.log.error(msg),
        };
    }

    /**
     * IAttributeSink: update attribute state
     */
    public async updateAttribute(name: AttributeName, value: string, log: boolean): Promise<void> {
        await this.setStateAsync(`player.${name}`, { val: value, ack: true });
        if (log) this.log.info(`${name}: ${value}`);
    }

    /**
     * IAttributeSink: device identity
     */
    public async getIdentity(): Promise<string | undefined> {
        const state = await this.getStateAsync('info.deviceId');
        return state && typeof state.val === 'string' && state.val !== '' ? state.val : undefined;
    }

    public async setIdentity(id: string): Promise<void> {
        await this.setStateAsync('info.deviceId', { val: id, ack: true });
    }

    /**
     * Called once a subscribed state changes. Initialized by Class constructor.
     *  @param stateId - e.g. "volumio-player.0.commands.setVolume"
     *  @param stateObj - e.g. { val: 37, ack: false, ts: 123456789, q: 0, lc: 123456789 }
     */
    private async _asyncOnStateChange(stateId: string, stateObj: ioBroker.State | null | undefined): Promise<void> {
        try {
            if (!stateObj || stateObj.ack) return;
            if (!this.device) throw `Command ${stateId} received before adapter was ready.`;
            const prefix = `${this.namespace}.commands.`;
            if (!stateId.startsWith(prefix)) return;
            const cmd = stateId.slice(prefix.length); // e.g. 'setVolume'
            this.log.debug(`${stateId} set to '${stateObj.val}' (ack:false) by user.`);

            if (cmd === 'refresh') {
                await this.device.refresh();
            } else if (cmd === 'initialize') {
                await this.device.initialize({
                    schedulePush: this.config.schedulePush,
                    push: this.config.mode === 'push',
                    playlist: this.config.playlist || undefined,
                    random: toPreselection(this.config.random),
                    repeat: toPreselection(this.config.repeat),
                });
                await this.setStateAsync('info.nextEnrollment', { val: this.device.enrollment.nextEnrollment(), ack: true });
            } else if (cmd === 'enablePushNotifications') {
                await this.device.enrollment.enroll();
            } else if (isCommandName(cmd)) {
                await this.device.commands.dispatch(cmd, stateObj.val);
            } else {
                throw `Unknown command state '${stateId}'`;
            }
            await this.setStateAsync(stateId, { val: stateObj.val, ack: true });
        } catch (e) {
            this.log.error(this.err2Str(e));
            return;
        }
    }

    /**
     * Create objects
     * @returns true if successful, false if not
     */
    private async createObjectsAsync(): Promise<true | false> {
        try {
            await this.setObjectNotExistsAsync('info.deviceId', { type: 'state', common: { name: 'Device ID: MAC address of the Volumio host', type: 'string', role: 'info.mac', read: true, write: false, def: '' }, native: {} });
            await this.setObjectNotExistsAsync('info.lifecycle', { type: 'state', common: { name: 'Lifecycle: uninitialized, identifying, enrolling, idle, reconciling', type: 'string', role: 'info.status', read: true, write: false, def: 'uninitialized' }, native: {} });
            await this.setObjectNotExistsAsync('info.nextEnrollment', { type: 'state', common: { name: 'Next scheduled push notification enrollment', type: 'number', role: 'date', read: true, write: false, def: 0 }, native: {} });

            await this.setObjectNotExistsAsync('player', { type: 'channel', common: { name: 'Volumio player attributes' }, native: {} });
            for (const name of ATTRIBUTE_NAMES) {
                const role = name === 'trackData' || name === 'otherzones' ? 'json' : 'text';
                await this.setObjectNotExistsAsync(`player.${name}`, { type: 'state', common: { name: name, type: 'string', role: role, read: true, write: false }, native: {} });
            }

            await this.setObjectNotExistsAsync('commands', { type: 'channel', common: { name: 'Volumio player commands' }, native: {} });
            for (const [id, def] of Object.entries(COMMAND_STATES)) {
                const common: ioBroker.StateCommon = { name: def.name, type: def.type, role: def.role, read: def.type !== 'boolean', write: true };
                if (def.min !== undefined) common.min = def.min;
                if (def.max !== undefined) common.max = def.max;
                await this.setObjectNotExistsAsync(`commands.${id}`, { type: 'state', common: common, native: {} });
            }
            return true;
        } catch (e) {
            this.log.error(this.err2Str(e));
            return false;
        }
    }

    /**
     * Is called when adapter shuts down - callback has to be called under any circumstances!
     */
    private _onUnload(callback: () => void): void {
        try {
            if (this.device) {
                this.device.destroy();
                this.log.debug('Polling and push notification schedule stopped');
            }
            if (this.server) this.server.close();
            callback();
        } catch (e) {
            callback();
        }
    }
}

if (require.main !== module) {
    // Export the constructor in compact mode
    module.exports = (options: Partial<utils.AdapterOptions> | undefined) => new VolumioPlayer(options);
} else {
    // otherwise start the instance directly
    (() => new VolumioPlayer())();
}
