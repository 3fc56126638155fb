import { readFile } from 'node:fs/promises';

export const ARP_TABLE = '/proc/net/arp';
const EMPTY_MAC = '000000000000';

/**
 * Resolves an IPv4 address to a hardware identifier.
 */
export interface IIdentityResolver {
    resolve(ip: string): Promise<string | undefined>;
}

/**
 * 'b8:27:eb:12:34:56' -> 'B827EB123456'
 */
export function normalizeMacId(value?: string | null): string | undefined {
    const trimmed = value?.trim();
    if (!trimmed) return undefined;
    const cleaned = trimmed.replace(/[^a-fA-F0-9]/g, '').toUpperCase();
    if (cleaned.length !== 12 || cleaned === EMPTY_MAC) return undefined;
    return cleaned;
}

/**
 * Parse the kernel ARP table.
 * Format: 'IP address  HW type  Flags  HW address  Mask  Device', one header line.
 * @returns map of ip -> normalized MAC id
 */
export function parseArpTable(text: string): Map<string, string> {
    const table = new Map<string, string>();
    for (const line of text.split('\n').slice(1)) {
        const cols = line.trim().split(/\s+/);
        if (cols.length < 4) continue;
        const mac = normalizeMacId(cols[3]);
        if (mac) table.set(cols[0], mac);
    }
    return table;
}

/**
 * Looks the address up in the local ARP table. The host has talked to Volumio right
 * before the lookup, so the entry is present as long as both are on the same network.
 */
export class ArpIdentityResolver implements IIdentityResolver {
    public constructor(private readonly tablePath: string = ARP_TABLE) {}

    public async resolve(ip: string): Promise<string | undefined> {
        const text = await readFile(this.tablePath, 'utf8');
        return parseArpTable(text).get(ip);
    }
}
