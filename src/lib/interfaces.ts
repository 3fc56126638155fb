/**
 * Attribute names of the player, in the order they are reported.
 */
export const ATTRIBUTE_NAMES = ['status', 'artist', 'title', 'album', 'musicservice', 'volume', 'level', 'mute', 'uri', 'trackDescription', 'trackData', 'playlists', 'otherzones'] as const;
export type AttributeName = (typeof ATTRIBUTE_NAMES)[number];

/**
 * Last known attribute values, always compared as strings.
 */
export type AttributeSet = Partial<Record<AttributeName, string>>;

/**
 * Player state as reported by Volumio `getState` or a `state` push notification.
 * Only the fields the adapter consumes; anything else is dropped when decoding.
 */
export interface IRawState {
    status?: string | null; // 'play', 'pause', 'stop'
    artist?: string | null;
    title?: string | null;
    album?: string | null;
    service?: string | null; // 'mpd', 'spop', 'pandora', ...
    volume?: number | string | null;
    mute?: boolean | string | null;
    uri?: string | null;
    albumart?: string | null;
}

export interface IZoneEntry {
    name: string;
    status: string;
    isSelf: boolean;
}

export interface ITrackData {
    artist: string | null;
    title: string | null;
    album: string | null;
    image: string | null;
    source: string | null;
}

/**
 * Decoded push notification. `item` is absent for connection lifecycle notices.
 */
export interface INotificationEnvelope {
    item?: string;
    data?: unknown;
}

export interface ITrackRequest {
    uri: string;
    service: string;
    title?: string;
}

export interface ISystemInfo {
    host?: string; // e.g. 'http://192.168.1.20'
    name?: string;
    systemversion?: string;
}

export type LifecycleState = 'uninitialized' | 'identifying' | 'enrolling' | 'idle' | 'reconciling';

/**
 * Logger as handed out by the adapter (this.log), narrowed to the levels used here.
 */
export type ILogger = Pick<ioBroker.Logger, 'debug' | 'info' | 'warn' | 'error'>;

/**
 * Remote REST access to a Volumio host.
 */
export interface ITransport {
    /** GET `/api/v1/{pathPrefix}{command}` and return the decoded JSON */
    get(pathPrefix: string, command: string): Promise<unknown>;
    /** POST a JSON body to `path` and return the decoded acknowledgement */
    post(path: string, body: Record<string, unknown>): Promise<unknown>;
}

/**
 * Where attribute events and the device identity end up (ioBroker states in the adapter).
 */
export interface IAttributeSink {
    updateAttribute(name: AttributeName, value: string, log: boolean): Promise<void>;
    getIdentity(): Promise<string | undefined>;
    setIdentity(id: string): Promise<void>;
}
