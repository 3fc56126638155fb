import { Job, scheduleJob } from 'node-schedule';
import { PlayerError, TransportError, ValidationError } from './errors';
import { IIdentityResolver } from './identity';
import { IAttributeSink, ILogger, ISystemInfo, ITransport } from './interfaces';
import { err2Str, getNextCronRun, stripScheme } from './methods';

/** Schedule value which turns nightly re-enrollment off */
export const SCHEDULE_OFF = 'No';

export interface IEnrollmentOptions {
    transport: ITransport;
    sink: IAttributeSink;
    resolver: IIdentityResolver;
    log: ILogger;
    /** push target announced to Volumio, e.g. 'http://192.168.1.10:39501' */
    callbackUrl: string;
    /** called after every scheduled enrollment with the timestamp of the next one */
    onScheduledRun?: (next: number) => Promise<void>;
}

/**
 * Convert a 12-hour time like '3 AM' or '12 PM' into the hour of day.
 * @returns 0 - 23
 */
export function parseScheduleTime(time: string): number {
    const match = /^\s*(\d{1,2})\s*(AM|PM)\s*$/i.exec(time);
    if (!match) throw new ValidationError(`Invalid schedule time '${time}', expected e.g. '3 AM' or 'No'`);
    let hr = parseInt(match[1], 10);
    if (hr < 1 || hr > 12) throw new ValidationError(`Invalid schedule time '${time}', hour must be 1-12`);
    if (hr === 12) hr -= 12; // 12 AM -> 0, 12 PM -> 12
    if (match[2].toUpperCase() === 'PM') hr += 12;
    return hr;
}

/**
 * Device identity and push notification enrollment.
 * Holds at most one scheduled re-enrollment job.
 */
export class EnrollmentManager {
    private job: Job | null = null;
    private rule: string | undefined;
    private address: string | undefined;

    public constructor(private readonly options: IEnrollmentOptions) {}

    /**
     * Set the device identity to the MAC address of the Volumio host.
     * @returns true if the identity was changed
     */
    public async setIdentity(): Promise<boolean> {
        const { transport, sink, resolver, log } = this.options;
        const info = toSystemInfo(await transport.get('', 'getSystemInfo'));
        if (!info.host) throw new TransportError('System info without host address', info);
        const ip = stripScheme(info.host).split(/[:/]/)[0]; // 'http://192.168.1.20:3000' -> '192.168.1.20'
        this.address = ip;
        const mac = await resolver.resolve(ip);
        if (!mac) throw new ValidationError(`Could not resolve MAC address of Volumio host ${ip}`);
        if ((await sink.getIdentity()) === mac) {
            log.info(`Device ID already set to Volumio MAC address ${mac}`);
            return false;
        }
        await sink.setIdentity(mac);
        log.info(`Device ID set to Volumio MAC address ${mac}`);
        return true;
    }

    /**
     * Register the callback URL for Volumio push notifications.
     * Volumio forgets the registration on restart.
     */
    public async enroll(): Promise<void> {
        const { callbackUrl } = this.options;
        await this.options.transport.post('/api/v1/pushNotificationUrls', { url: callbackUrl });
        this.options.log.info(`Push Notifications Enabled (${callbackUrl})`);
    }

    /**
     * Re-enroll once a day.
     * @param time - 'No' to cancel, or '12 AM' ... '11 PM'; replaces any previous schedule
     * @returns hour of day, or undefined if cancelled
     */
    public schedule(time: string): number | undefined {
        if (time === SCHEDULE_OFF) {
            this.cancel();
            return undefined;
        }
        const hr = parseScheduleTime(time);
        this.cancel();
        const rule = `0 0 ${hr} * * *`;
        this.job = scheduleJob(rule, () => this.runScheduled());
        this.rule = rule;
        this.options.log.info(`Scheduled push notification enrollment every day at ${time}`);
        return hr;
    }

    /**
     * Body of the scheduled job: enroll, then report the next run.
     * Failures are logged, the schedule stays.
     */
    public async runScheduled(): Promise<void> {
        const { log, onScheduledRun } = this.options;
        try {
            await this.enroll();
        } catch (e) {
            log.error(`Scheduled push notification enrollment failed: ${e instanceof PlayerError ? e.message : err2Str(e)}`);
        }
        if (!onScheduledRun) return;
        try {
            await onScheduledRun(this.nextEnrollment());
        } catch (e) {
            log.error(err2Str(e));
        }
    }

    /**
     * Cancel the scheduled re-enrollment, if any
     */
    public cancel(): void {
        if (this.job) {
            this.job.cancel();
            this.options.log.debug(`Cancelled push notification schedule '${this.rule}'`);
        }
        this.job = null;
        this.rule = undefined;
    }

    /** IP address of the Volumio host as reported by the last setIdentity() */
    public get hostAddress(): string | undefined {
        return this.address;
    }

    /** cron rule of the active schedule */
    public get activeRule(): string | undefined {
        return this.rule;
    }

    /**
     * Timestamp of the next scheduled enrollment, 0 if none
     */
    public nextEnrollment(from: Date = new Date()): number {
        if (!this.rule) return 0;
        const next = getNextCronRun(this.rule, from);
        return next === -1 ? 0 : next;
    }
}

function toSystemInfo(json: unknown): ISystemInfo {
    const info: ISystemInfo = {};
    if (json === null || typeof json !== 'object') return info;
    if ('host' in json && typeof json.host === 'string') info.host = json.host;
    if ('name' in json && typeof json.name === 'string') info.name = json.name;
    if ('systemversion' in json && typeof json.systemversion === 'string') info.systemversion = json.systemversion;
    return info;
}
