import { TransportError, UnsupportedCommandError, ValidationError } from './errors';
import { ILogger, ITrackRequest, ITransport } from './interfaces';
import { err2Str } from './methods';
import { COMMAND_PREFIX } from './transport';

/**
 * Commands accepted by the adapter. The last three are not backed by Volumio.
 */
export const COMMAND_NAMES = [
    'play',
    'pause',
    'stop',
    'nextTrack',
    'previousTrack',
    'clearQueue',
    'mute',
    'unmute',
    'volumeUp',
    'volumeDown',
    'setVolume',
    'setLevel',
    'repeat',
    'random',
    'setPlaylist',
    'setTrack',
    'playTrack',
    'playText',
    'restoreTrack',
    'resumeTrack',
] as const;
export type CommandName = (typeof COMMAND_NAMES)[number];

export function isCommandName(name: string): name is CommandName {
    const names: readonly string[] = COMMAND_NAMES;
    return names.includes(name);
}

/** Services whose URIs are stations that have to be opened via browse */
const STATION_SERVICES = ['pandora'];

/**
 * Translates player commands into the Volumio REST command grammar.
 */
export class CommandDispatcher {
    public constructor(
        private readonly transport: ITransport,
        private readonly log: ILogger,
    ) {}

    /**
     * Run a command by name. Failures are logged and never thrown.
     * @param name - command name, e.g. 'setVolume'
     * @param arg - command argument as written to the command state, e.g. 37
     */
    public async dispatch(name: CommandName, arg?: ioBroker.StateValue): Promise<void> {
        try {
            switch (name) {
                case 'play':
                case 'pause':
                case 'stop':
                case 'clearQueue':
                case 'mute':
                case 'unmute':
                case 'volumeUp':
                case 'volumeDown':
                case 'nextTrack':
                case 'previousTrack':
                    return await this[name]();
                case 'setVolume':
                case 'setLevel':
                    return await this.setVolume(toVolume(arg));
                case 'repeat':
                case 'random':
                    return await this[name](toToggle(arg));
                case 'setPlaylist':
                    return await this.setPlaylist(requireString(name, arg));
                case 'setTrack':
                case 'playTrack':
                    return await this[name](toTrackRequest(arg));
                case 'playText':
                case 'restoreTrack':
                case 'resumeTrack':
                    return this[name]();
            }
        } catch (e) {
            if (e instanceof UnsupportedCommandError || e instanceof ValidationError) {
                this.log.warn(e.message);
            } else if (e instanceof TransportError) {
                this.log.error(`${e.message}${e.response !== undefined ? ` - response: ${JSON.stringify(e.response)}` : ''}`);
            } else {
                this.log.error(err2Str(e));
            }
        }
    }

    public async play(): Promise<void> {
        await this.sendCommand('play');
    }

    public async pause(): Promise<void> {
        await this.sendCommand('pause');
    }

    public async stop(): Promise<void> {
        await this.sendCommand('stop');
    }

    public async nextTrack(): Promise<void> {
        await this.sendCommand('next');
    }

    public async previousTrack(): Promise<void> {
        await this.sendCommand('prev');
    }

    public async clearQueue(): Promise<void> {
        await this.sendCommand('clearQueue');
    }

    public async mute(): Promise<void> {
        await this.sendCommand('volume&volume=mute');
    }

    public async unmute(): Promise<void> {
        await this.sendCommand('volume&volume=unmute');
    }

    public async volumeUp(): Promise<void> {
        await this.sendCommand('volume&volume=plus');
    }

    public async volumeDown(): Promise<void> {
        await this.sendCommand('volume&volume=minus');
    }

    public async setVolume(level: number): Promise<void> {
        await this.sendCommand(`volume&volume=${level}`);
    }

    /**
     * @param value - undefined toggles, true/false sets explicitly
     */
    public async repeat(value?: boolean): Promise<void> {
        await this.sendCommand(value === undefined ? 'repeat' : `repeat&value=${value}`);
    }

    /**
     * @param value - undefined toggles, true/false sets explicitly
     */
    public async random(value?: boolean): Promise<void> {
        await this.sendCommand(value === undefined ? 'random' : `random&value=${value}`);
    }

    /**
     * Names of all Volumio playlists
     */
    public async listPlaylists(): Promise<string[]> {
        const res = await this.transport.get('', 'listplaylists');
        if (!Array.isArray(res)) throw new TransportError('Invalid playlist listing', res);
        const names: unknown[] = res;
        return names.filter((n): n is string => typeof n === 'string');
    }

    /**
     * Play a playlist. The name must match a listed playlist exactly (case-sensitive).
     */
    public async setPlaylist(name: string): Promise<void> {
        const playlists = await this.listPlaylists();
        if (!playlists.includes(name)) throw new ValidationError(`Invalid Playlist name: ${name}`);
        await this.sendCommand(`playplaylist&name=${encodeURIComponent(name)}`);
    }

    /**
     * Add a track to the queue
     */
    public async setTrack(track: ITrackRequest): Promise<void> {
        const body = trackBody(track);
        await this.transport.post('/api/v1/addToQueue', body);
        this.log.info(`Add to queue: ${JSON.stringify(body)}`);
    }

    /**
     * Replace the queue with a track and play it. Station services are opened via browse.
     */
    public async playTrack(track: ITrackRequest): Promise<void> {
        const service = track.service.toLowerCase();
        if (STATION_SERVICES.some((s) => service.includes(s))) {
            await this.transport.get('', `browse?uri=${encodeURIComponent(track.uri)}`);
            this.log.info(`Sent Command: browse ${track.uri}`);
            return;
        }
        const body = trackBody(track);
        await this.transport.post('/api/v1/replaceAndPlay', body);
        this.log.info(`Replace queue and play: ${JSON.stringify(body)}`);
    }

    public playText(): void {
        throw new UnsupportedCommandError('Play Text - This Function is Not Enabled');
    }

    public restoreTrack(): void {
        throw new UnsupportedCommandError('Restore Track - This Function is Not Enabled');
    }

    public resumeTrack(): void {
        throw new UnsupportedCommandError('Resume Track - This Function is Not Enabled');
    }

    private async sendCommand(cmd: string): Promise<void> {
        await this.transport.get(COMMAND_PREFIX, cmd);
        this.log.info(`Sent Command: ${cmd}`);
    }
}

function trackBody(track: ITrackRequest): Record<string, unknown> {
    const body: Record<string, unknown> = { service: track.service, uri: track.uri };
    if (track.title) body.title = track.title;
    return body;
}

function requireString(name: string, arg: ioBroker.StateValue | undefined): string {
    if (typeof arg !== 'string' || arg.trim() === '') throw new ValidationError(`${name}: argument missing`);
    return arg;
}

/**
 * 37, '37' -> 37
 */
export function toVolume(arg: ioBroker.StateValue | undefined): number {
    const level = typeof arg === 'number' ? arg : typeof arg === 'string' && arg.trim() !== '' ? Number(arg) : NaN;
    if (!Number.isFinite(level)) throw new ValidationError(`Invalid volume level: ${String(arg)}`);
    return Math.round(level);
}

/**
 * '', null, undefined -> toggle (undefined); true/'true' -> true; false/'false' -> false
 */
export function toToggle(arg: ioBroker.StateValue | undefined): boolean | undefined {
    if (arg === undefined || arg === null || arg === '') return undefined;
    if (arg === true || arg === 'true') return true;
    if (arg === false || arg === 'false') return false;
    throw new ValidationError(`Invalid toggle value: ${String(arg)}`);
}

/**
 * JSON '{"uri": "...", "service": "...", "title": "..."}' -> track request
 */
export function toTrackRequest(arg: ioBroker.StateValue | undefined): ITrackRequest {
    if (typeof arg !== 'string') throw new ValidationError('Track: expected JSON with uri and service');
    let json: unknown;
    try {
        json = JSON.parse(arg);
    } catch {
        throw new ValidationError(`Track: invalid JSON ${arg}`);
    }
    if (json === null || typeof json !== 'object') throw new ValidationError(`Track: invalid JSON ${arg}`);
    const uri = 'uri' in json && typeof json.uri === 'string' ? json.uri : '';
    const service = 'service' in json && typeof json.service === 'string' ? json.service : '';
    if (uri === '' || service === '') throw new ValidationError('Track: uri and service are required');
    const track: ITrackRequest = { uri, service };
    if ('title' in json && typeof json.title === 'string' && json.title !== '') track.title = json.title;
    return track;
}
