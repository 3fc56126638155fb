import { DecodeError } from './errors';
import { INotificationEnvelope } from './interfaces';

const BODY_MARKER = 'body:';
const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Decode a forwarded raw message like 'headers:..., body:eyJpdGVtIjoic3RhdGUifQ=='.
 * The part after the `body:` marker is base64 encoded UTF-8 JSON.
 * @param rawMessage - raw message as forwarded by a relay
 */
export function decodeRawNotification(rawMessage: string): INotificationEnvelope {
    const idx = rawMessage.indexOf(BODY_MARKER);
    if (idx === -1) throw new DecodeError('Push notification without body');
    const body = rawMessage.slice(idx + BODY_MARKER.length).split(',')[0].trim();
    if (body === '' || body.length % 4 === 1 || !BASE64.test(body)) throw new DecodeError(`Push notification body is not base64: ${body}`);
    let json: unknown;
    try {
        json = JSON.parse(Buffer.from(body, 'base64').toString('utf8'));
    } catch {
        throw new DecodeError(`Push notification body is not JSON: ${body}`);
    }
    return toEnvelope(json);
}

/**
 * Turn an already parsed push notification body into an envelope.
 * `data` is passed through untouched.
 */
export function toEnvelope(json: unknown): INotificationEnvelope {
    if (json === null || typeof json !== 'object' || Array.isArray(json)) throw new DecodeError(`Push notification is not a JSON object: ${JSON.stringify(json)}`);
    const envelope: INotificationEnvelope = {};
    if ('item' in json && typeof json.item === 'string' && json.item !== '') envelope.item = json.item;
    if ('data' in json) envelope.data = json.data;
    return envelope;
}
