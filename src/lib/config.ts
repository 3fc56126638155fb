import { SCHEDULE_OFF, parseScheduleTime } from './enrollment';
import { ILogger } from './interfaces';
import { err2Str, stripScheme } from './methods';

export const DEFAULT_HOST = 'volumio.local';
export const DEFAULT_PUSH_PORT = 39501;

/**
 * Verify and correct the adapter configuration. Every correction is logged as warning.
 * @returns corrected copy
 */
export function normalizeConfig(input: ioBroker.AdapterConfig, log: ILogger): ioBroker.AdapterConfig {
    const config: ioBroker.AdapterConfig = { ...input };

    config.host = stripScheme(config.host || '');
    if (config.host === '') {
        log.warn(`No Volumio host configured, using '${DEFAULT_HOST}'`);
        config.host = DEFAULT_HOST;
    }
    if (config.mode !== 'poll') config.mode = 'push';
    if (!config.pollInterval || config.pollInterval < 1) config.pollInterval = 1;
    if (!config.pushPort || config.pushPort < 1 || config.pushPort > 65535) {
        log.warn(`Invalid push port '${config.pushPort}', using ${DEFAULT_PUSH_PORT}`);
        config.pushPort = DEFAULT_PUSH_PORT;
    }
    if (!config.schedulePush) config.schedulePush = SCHEDULE_OFF;
    if (config.schedulePush !== SCHEDULE_OFF) {
        try {
            parseScheduleTime(config.schedulePush);
        } catch (e) {
            log.warn(`${e instanceof Error ? e.message : err2Str(e)} - nightly re-enrollment deactivated`);
            config.schedulePush = SCHEDULE_OFF;
        }
    }
    return config;
}

/**
 * '' -> undefined (leave unchanged), 'true' -> true, 'false' -> false
 */
export function toPreselection(value: string | undefined): boolean | undefined {
    if (value === 'true') return true;
    if (value === 'false') return false;
    return undefined;
}
