import { IZoneEntry } from './interfaces';

export interface IZoneResult {
    next: string;
    changed: boolean;
}

/**
 * Collapse the zone list to {name: status} of all other zones and compare it as a whole.
 * @param prev - serialized mapping stored last time, undefined if none
 * @param zones - zone list in Volumio order
 */
export function reconcileZones(prev: string | undefined, zones: IZoneEntry[]): IZoneResult {
    const next = serializeZones(zones.filter((zone) => !zone.isSelf));
    return { next, changed: next !== prev };
}

/**
 * JSON object text of {name: status} in list order.
 * Built from pairs: an object would move numeric names to the front and swallow '__proto__'.
 * A repeated name keeps its first position and its last status.
 */
export function serializeZones(zones: IZoneEntry[]): string {
    const pairs = new Map<string, string>();
    for (const zone of zones) pairs.set(zone.name, zone.status);
    return `{${[...pairs].map(([name, status]) => `${JSON.stringify(name)}:${JSON.stringify(status)}`).join(',')}}`;
}

/**
 * Find the zone list in a `getZones` response ({zones: [...]}), a `zones` push ({list: [...]}) or a bare array.
 * @returns undefined if there is none
 */
export function findZoneList(json: unknown): unknown[] | undefined {
    let list: unknown = json;
    if (json !== null && typeof json === 'object' && !Array.isArray(json)) {
        if ('zones' in json) list = json.zones;
        else if ('list' in json) list = json.list;
    }
    if (!Array.isArray(list)) return undefined;
    const entries: unknown[] = list;
    return entries;
}

/**
 * Decode a zone list, from `getZones` ({zones: [...]}) or a `zones` push ({list: [...]}).
 * Each entry carries its status either in `state.status` or directly in `status`.
 */
export function toZoneList(json: unknown): IZoneEntry[] {
    const entries = findZoneList(json) ?? [];

    const result: IZoneEntry[] = [];
    for (const entry of entries) {
        if (entry === null || typeof entry !== 'object') continue;
        const name = 'name' in entry && typeof entry.name === 'string' ? entry.name : undefined;
        if (name === undefined) continue;
        let status = 'none';
        if ('state' in entry && entry.state !== null && typeof entry.state === 'object' && 'status' in entry.state && typeof entry.state.status === 'string') {
            status = entry.state.status;
        } else if ('status' in entry && typeof entry.status === 'string') {
            status = entry.status;
        }
        const isSelf = 'isSelf' in entry && entry.isSelf === true;
        result.push({ name, status, isSelf });
    }
    return result;
}
