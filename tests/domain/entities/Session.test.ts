import { Session } from '../../../src/domain/entities/Session';
import { ProfileRegistry } from '../../../src/application/services/ProfileRegistry';
import { Destination } from '../../../src/domain/value-objects/Destination';
import { SessionId } from '../../../src/domain/value-objects/SessionId';
import { SessionStatus } from '../../../src/domain/value-objects/SessionStatus';
import { SourceDescriptors } from '../../../src/domain/value-objects/SourceDescriptor';
import { InvalidTransitionError } from '../../../src/domain/errors/BroadcastErrors';
import { FakeProcessHandle } from '../../support/fakes';

describe('Session Entity', () => {
  const registry = new ProfileRegistry(720);
  const command = { command: 'ffmpeg', args: [], fullCommand: 'ffmpeg' };

  const createSession = (process = new FakeProcessHandle(101, command, true)) =>
    Session.create({
      id: SessionId.fromString('123e4567-e89b-12d3-a456-426614174000'),
      ownerId: '42',
      source: SourceDescriptors.playlist(['a.mp4', 'b.mp4']),
      destination: Destination.create('rtmp://example/live', 'secret123'),
      profile: registry.resolve(720),
      loop: true,
      trigger: 'operator',
      process,
    });

  it('should start running with no restarts', () => {
    const session = createSession();

    expect(session.toView()).toEqual({
      id: '123e4567-e89b-12d3-a456-426614174000',
      ownerId: '42',
      status: SessionStatus.RUNNING,
      tier: 720,
      loop: true,
      restartCount: 0,
      sourceKind: 'playlist',
      startedAt: session.createdAt.toISOString(),
    });
    expect(session.requestedTier).toBe(720);
  });

  it('should build a playlist queue for playlist sources', () => {
    const session = createSession();

    session.playlist?.markPlayed(1);

    expect(session.launchSource()).toEqual(SourceDescriptors.playlist(['b.mp4']));
  });

  it('should suspend and continue the process on pause and resume', () => {
    const process = new FakeProcessHandle(101, command, true);
    const session = createSession(process);

    session.pause();
    expect(session.status).toBe(SessionStatus.PAUSED);
    expect(process.suspended).toBe(true);

    session.resume();
    expect(session.status).toBe(SessionStatus.RUNNING);
    expect(process.suspended).toBe(false);
  });

  it('should keep its status when the platform cannot suspend', () => {
    const session = createSession(new FakeProcessHandle(101, command, false));

    expect(() => session.pause()).toThrow('pause is not supported on win32');
    expect(session.status).toBe(SessionStatus.RUNNING);
  });

  it('should reject illegal transitions', () => {
    const session = createSession();

    expect(() => session.markStopped()).toThrow(InvalidTransitionError);
    expect(() => session.resume()).toThrow('Cannot move session from running to running');
  });

  it('should only increase the restart count through unexpected exits', () => {
    const session = createSession();

    expect(session.recordUnexpectedExit()).toBe(1);
    expect(session.recordUnexpectedExit()).toBe(2);
    expect(session.restartCount).toBe(2);
  });

  it('should refuse to replace a live process', () => {
    const session = createSession();

    expect(() => session.replaceProcess(new FakeProcessHandle(102, command, true))).toThrow(
      'Session 123e4567-e89b-12d3-a456-426614174000 still owns live process 101'
    );
  });

  it('should return to running when a paused session gets a new process', () => {
    const process = new FakeProcessHandle(101, command, true);
    const session = createSession(process);
    session.pause();
    process.exit(1);

    session.replaceProcess(new FakeProcessHandle(102, command, true));

    expect(session.status).toBe(SessionStatus.RUNNING);
    expect(session.process.pid).toBe(102);
  });

  it('should move the adaptation ceiling only for requested profile changes', () => {
    const session = createSession();

    session.changeProfile(registry.resolve(480));
    expect(session.requestedTier).toBe(720);

    session.changeProfile(registry.resolve(1080), true);
    expect(session.requestedTier).toBe(1080);
    expect(session.profile.tier).toBe(1080);
  });

  it('should abort the previous monitor when a new one attaches', () => {
    const session = createSession();
    const first = session.attachMonitor();

    const second = session.attachMonitor();

    expect(first.aborted).toBe(true);
    expect(second.aborted).toBe(false);
    session.cancelMonitor();
    expect(second.aborted).toBe(true);
  });

  it('should mask the destination when serialised', () => {
    const session = createSession();

    expect(session.toJSON()).toEqual(
      expect.objectContaining({ destination: 'rtmp://example/live/*****t123', pid: 101 })
    );
  });
});
