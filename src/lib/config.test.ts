import { expect } from 'chai';
import { FakeLogger } from '../test/fakes';
import { normalizeConfig, toPreselection } from './config';

const CONFIG: ioBroker.AdapterConfig = {
    host: 'http://192.168.1.20',
    mode: 'push',
    pollInterval: 30,
    pushPort: 39501,
    callbackHost: '',
    schedulePush: '3 AM',
    debugOutput: false,
    apiDebugOutput: false,
    playlist: '',
    random: '',
    repeat: '',
};

describe('config => normalizeConfig()', () => {
    let log: FakeLogger;

    beforeEach(() => {
        log = new FakeLogger();
    });

    it('keeps a valid configuration and strips the scheme', () => {
        const config = normalizeConfig(CONFIG, log);
        expect(config).to.deep.equal({ ...CONFIG, host: '192.168.1.20' });
        expect(log.entries).to.deep.equal([]);
    });

    it('does not modify the input', () => {
        normalizeConfig({ ...CONFIG, host: '' }, log);
        expect(CONFIG.host).to.equal('http://192.168.1.20');
    });

    it('falls back to defaults', () => {
        const config = normalizeConfig({ ...CONFIG, host: '', pollInterval: 0, pushPort: 70000, schedulePush: '' }, log);
        expect(config.host).to.equal('volumio.local');
        expect(config.pollInterval).to.equal(1);
        expect(config.pushPort).to.equal(39501);
        expect(config.schedulePush).to.equal('No');
        expect(log.messages('warn')).to.deep.equal([`No Volumio host configured, using 'volumio.local'`, `Invalid push port '70000', using 39501`]);
    });

    it('deactivates an invalid schedule time', () => {
        const config = normalizeConfig({ ...CONFIG, schedulePush: '13 AM' }, log);
        expect(config.schedulePush).to.equal('No');
        expect(log.messages('warn')).to.deep.equal([`Invalid schedule time '13 AM', hour must be 1-12 - nightly re-enrollment deactivated`]);
    });
});

describe('config => toPreselection()', () => {
    it('maps the select values', () => {
        expect(toPreselection('true')).to.equal(true);
        expect(toPreselection('false')).to.equal(false);
        expect(toPreselection('')).to.equal(undefined);
        expect(toPreselection(undefined)).to.equal(undefined);
    });
});
