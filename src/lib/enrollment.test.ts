import { expect } from 'chai';
import { scheduledJobs } from 'node-schedule';
import sinon from 'sinon';
import { FakeLogger, FakeSink, FakeTransport } from '../test/fakes';
import { EnrollmentManager, parseScheduleTime } from './enrollment';
import { TransportError, ValidationError } from './errors';
import { IIdentityResolver } from './identity';

describe('enrollment => parseScheduleTime()', () => {
    it('converts 12-hour times to the hour of day', () => {
        expect(parseScheduleTime('12 AM')).to.equal(0);
        expect(parseScheduleTime('1 AM')).to.equal(1);
        expect(parseScheduleTime('11 AM')).to.equal(11);
        expect(parseScheduleTime('12 PM')).to.equal(12);
        expect(parseScheduleTime('2 PM')).to.equal(14);
        expect(parseScheduleTime('11 PM')).to.equal(23);
    });

    it('rejects anything else', () => {
        expect(() => parseScheduleTime('13 PM')).to.throw(ValidationError);
        expect(() => parseScheduleTime('0 AM')).to.throw(ValidationError);
        expect(() => parseScheduleTime('03:00')).to.throw(ValidationError);
    });
});

describe('enrollment => EnrollmentManager', () => {
    let transport: FakeTransport;
    let sink: FakeSink;
    let log: FakeLogger;
    let resolve: sinon.SinonStub<[string], Promise<string | undefined>>;
    let manager: EnrollmentManager;

    beforeEach(() => {
        transport = new FakeTransport();
        sink = new FakeSink();
        log = new FakeLogger();
        resolve = sinon.stub<[string], Promise<string | undefined>>().resolves('B827EB123456');
        const resolver: IIdentityResolver = { resolve };
        manager = new EnrollmentManager({ transport, sink, resolver, log, callbackUrl: 'http://192.168.1.10:39501' });
    });

    afterEach(() => {
        manager.cancel();
    });

    describe('setIdentity()', () => {
        beforeEach(() => {
            transport.responses.set('getSystemInfo', { id: 'abc', host: 'http://192.168.1.20', name: 'Volumio' });
        });

        it('resolves the host address and stores the MAC address', async () => {
            expect(await manager.setIdentity()).to.equal(true);
            expect(resolve.calledOnceWithExactly('192.168.1.20')).to.equal(true);
            expect(sink.identity).to.equal('B827EB123456');
            expect(log.messages('info')).to.deep.equal(['Device ID set to Volumio MAC address B827EB123456']);
        });

        it('does not write the identity again when nothing changed', async () => {
            await manager.setIdentity();
            expect(await manager.setIdentity()).to.equal(false);
            expect(sink.identityWrites).to.equal(1);
            expect(log.messages('info')[1]).to.equal('Device ID already set to Volumio MAC address B827EB123456');
        });

        it('strips a port from the host address', async () => {
            transport.responses.set('getSystemInfo', { host: 'http://192.168.1.20:3000' });
            await manager.setIdentity();
            expect(resolve.calledOnceWithExactly('192.168.1.20')).to.equal(true);
            expect(manager.hostAddress).to.equal('192.168.1.20');
        });

        it('fails when the address cannot be resolved', async () => {
            resolve.resolves(undefined);
            let error: unknown;
            try {
                await manager.setIdentity();
            } catch (e) {
                error = e;
            }
            expect(error).to.be.instanceOf(ValidationError);
            expect(sink.identityWrites).to.equal(0);
            expect(manager.hostAddress).to.equal('192.168.1.20');
        });

        it('fails when the system info has no host', async () => {
            transport.responses.set('getSystemInfo', { name: 'Volumio' });
            let error: unknown;
            try {
                await manager.setIdentity();
            } catch (e) {
                error = e;
            }
            expect(error).to.be.instanceOf(TransportError);
        });
    });

    it('enroll() posts the callback URL', async () => {
        await manager.enroll();
        expect(transport.calls).to.deep.equal([{ method: 'POST', path: '/api/v1/pushNotificationUrls', body: { url: 'http://192.168.1.10:39501' } }]);
        expect(log.messages('info')).to.deep.equal(['Push Notifications Enabled (http://192.168.1.10:39501)']);
    });

    describe('schedule()', () => {
        const jobCount = (): number => Object.keys(scheduledJobs).length;

        it('installs a daily job at minute 0 of the hour', () => {
            const before = jobCount();
            expect(manager.schedule('3 AM')).to.equal(3);
            expect(manager.activeRule).to.equal('0 0 3 * * *');
            expect(jobCount()).to.equal(before + 1);
        });

        it('cancels the job with No', () => {
            const before = jobCount();
            manager.schedule('3 AM');
            expect(manager.schedule('No')).to.equal(undefined);
            expect(manager.activeRule).to.equal(undefined);
            expect(jobCount()).to.equal(before);
        });

        it('keeps only the latest job', () => {
            const before = jobCount();
            manager.schedule('2 PM');
            manager.schedule('5 AM');
            expect(manager.activeRule).to.equal('0 0 5 * * *');
            expect(jobCount()).to.equal(before + 1);
        });

        it('keeps the previous job if the new time is invalid', () => {
            manager.schedule('2 PM');
            expect(() => manager.schedule('25 PM')).to.throw(ValidationError);
            expect(manager.activeRule).to.equal('0 0 14 * * *');
        });

        it('reports the next run after each scheduled enrollment', async () => {
            const reported: number[] = [];
            const scheduled = new EnrollmentManager({
                transport,
                sink,
                resolver: { resolve },
                log,
                callbackUrl: 'http://192.168.1.10:39501',
                onScheduledRun: async (next: number) => {
                    reported.push(next);
                },
            });
            scheduled.schedule('5 AM');
            await scheduled.runScheduled();
            scheduled.cancel();
            expect(transport.calls.map((c) => c.path)).to.deep.equal(['/api/v1/pushNotificationUrls']);
            expect(reported).to.have.length(1);
            expect(reported[0]).to.be.greaterThan(Date.now());
            expect(new Date(reported[0]).getHours()).to.equal(5);
        });

        it('reports the next run also when the scheduled enrollment fails', async () => {
            const reported: number[] = [];
            transport.responses.set('/api/v1/pushNotificationUrls', new TransportError('Request to volumio.local/api/v1/pushNotificationUrls failed: timeout of 5000ms exceeded'));
            const scheduled = new EnrollmentManager({
                transport,
                sink,
                resolver: { resolve },
                log,
                callbackUrl: 'http://192.168.1.10:39501',
                onScheduledRun: async (next: number) => {
                    reported.push(next);
                },
            });
            scheduled.schedule('5 AM');
            await scheduled.runScheduled();
            scheduled.cancel();
            expect(log.messages('error')).to.deep.equal(['Scheduled push notification enrollment failed: Request to volumio.local/api/v1/pushNotificationUrls failed: timeout of 5000ms exceeded']);
            expect(reported).to.have.length(1);
        });

        it('nextEnrollment() returns the next run, 0 without schedule', () => {
            const from = new Date(2026, 0, 1, 10, 30, 0);
            expect(manager.nextEnrollment(from)).to.equal(0);
            manager.schedule('5 AM');
            expect(manager.nextEnrollment(from)).to.equal(new Date(2026, 0, 2, 5, 0, 0).getTime());
        });
    });
});
