import { AttributeName, AttributeSet, IRawState, ITrackData } from './interfaces';
import { toAttributeString } from './methods';

/** Value stored when Volumio no longer reports a field */
export const NONE = 'none';

interface IFieldMapping {
    attribute: AttributeName;
    source: keyof IRawState;
    /** artist, title and album trigger a new track description */
    track?: true;
}

/**
 * Tracked attributes and the Volumio field each one is read from.
 * volume is mirrored into level; both are checked on their own.
 */
export const STATE_FIELDS: readonly IFieldMapping[] = [
    { attribute: 'status', source: 'status' },
    { attribute: 'artist', source: 'artist', track: true },
    { attribute: 'title', source: 'title', track: true },
    { attribute: 'album', source: 'album', track: true },
    { attribute: 'musicservice', source: 'service' },
    { attribute: 'volume', source: 'volume' },
    { attribute: 'level', source: 'volume' },
    { attribute: 'mute', source: 'mute' },
    { attribute: 'uri', source: 'uri' },
];

export interface IReconcileResult {
    next: AttributeSet;
    /** changed attributes, in reporting order */
    changed: AttributeName[];
}

/**
 * Diff a player state against the last known attributes.
 * Values are compared in their string form (mute false -> 'false'), so repeated
 * identical states produce no changes.
 * @param prev - last known attributes, not modified
 * @param raw - decoded player state
 */
export function reconcileState(prev: AttributeSet, raw: IRawState): IReconcileResult {
    const next: AttributeSet = { ...prev };
    const changed: AttributeName[] = [];
    let trackFlag = false;

    for (const field of STATE_FIELDS) {
        const str = toAttributeString(raw[field.source]);
        if (str === undefined) {
            // reset; a missing track field always re-evaluates the track description
            if (prev[field.attribute] !== NONE) {
                next[field.attribute] = NONE;
                changed.push(field.attribute);
            }
            if (field.track) trackFlag = true;
        } else {
            if (str !== prev[field.attribute]) {
                next[field.attribute] = str;
                changed.push(field.attribute);
                if (field.track) trackFlag = true;
            }
        }
    }

    if (trackFlag) {
        const description = buildTrackDescription(raw);
        const data = JSON.stringify(buildTrackData(raw));
        // both or neither
        if (description !== prev.trackDescription || data !== prev.trackData) {
            next.trackDescription = description;
            next.trackData = data;
            changed.push('trackDescription', 'trackData');
        }
    }
    return { next, changed };
}

/**
 * 'Artist - Title on Album', or 'none' without artist
 */
export function buildTrackDescription(raw: IRawState): string {
    const artist = toAttributeString(raw.artist);
    if (artist === undefined) return NONE;
    return `${artist} - ${toAttributeString(raw.title) ?? NONE} on ${toAttributeString(raw.album) ?? NONE}`;
}

export function buildTrackData(raw: IRawState): ITrackData {
    return {
        artist: toAttributeString(raw.artist) ?? null,
        title: toAttributeString(raw.title) ?? null,
        album: toAttributeString(raw.album) ?? null,
        image: toAttributeString(raw.albumart) ?? null,
        source: toAttributeString(raw.service) ?? null,
    };
}

/**
 * Pick the known fields from a decoded `getState` response or `state` push.
 * Fields of an unexpected type are dropped, which resets the attribute.
 */
export function toRawState(json: unknown): IRawState {
    const raw: IRawState = {};
    if (json === null || typeof json !== 'object') return raw;
    const obj: Record<string, unknown> = { ...json };
    for (const key of ['status', 'artist', 'title', 'album', 'service', 'uri', 'albumart'] as const) {
        const val = obj[key];
        if (typeof val === 'string') raw[key] = val;
    }
    if (typeof obj.volume === 'number' || typeof obj.volume === 'string') raw.volume = obj.volume;
    if (typeof obj.mute === 'boolean' || typeof obj.mute === 'string') raw.mute = obj.mute;
    return raw;
}
