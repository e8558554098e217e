import { StartBroadcastUseCase } from '../../../src/application/use-cases/StartBroadcastUseCase';
import { ProfileRegistry } from '../../../src/application/services/ProfileRegistry';
import {
  Delay,
  SessionSupervisor,
} from '../../../src/application/services/SessionSupervisor';
import { EncoderCommandBuilder } from '../../../src/domain/services/EncoderCommandBuilder';
import { SourceDescriptors } from '../../../src/domain/value-objects/SourceDescriptor';
import { ConfigurationMissingError } from '../../../src/domain/errors/BroadcastErrors';
import { createMockLogger, FakeProcessLauncher, flushPromises } from '../../support/fakes';

describe('StartBroadcastUseCase', () => {
  const registry = new ProfileRegistry(720);
  const immediateDelay: Delay = async (_ms, signal) => !signal.aborted;

  let launcher: FakeProcessLauncher;
  let builder: jest.Mocked<EncoderCommandBuilder>;
  let notify: jest.Mock;
  let supervisor: SessionSupervisor;
  let logger: ReturnType<typeof createMockLogger>;

  const createUseCase = (streamKey = 'secret123'): StartBroadcastUseCase =>
    new StartBroadcastUseCase(
      supervisor,
      registry,
      { endpoint: 'rtmp://example/live', streamKey },
      logger
    );

  beforeEach(() => {
    launcher = new FakeProcessLauncher();
    builder = {
      build: jest.fn().mockReturnValue({ command: 'ffmpeg', args: [], fullCommand: 'ffmpeg' }),
      releaseManifest: jest.fn().mockResolvedValue(undefined),
    };
    notify = jest.fn();
    logger = createMockLogger();
    supervisor = new SessionSupervisor(
      builder,
      launcher,
      registry,
      { notify },
      logger,
      { maxRestarts: 5, restartBackoffMs: 0, terminateTimeoutMs: 100, singleSessionPerOwner: false },
      immediateDelay
    );
  });

  afterEach(async () => {
    await supervisor.shutdown();
  });

  it('should start with the configured destination and default tier', async () => {
    // Act
    const result = await createUseCase().execute({
      ownerId: '42',
      source: SourceDescriptors.singleFile('clip.mp4'),
    });

    // Assert
    expect(result).toEqual({
      sessionId: expect.any(String),
      shortId: result.sessionId.slice(0, 8),
      tier: 720,
      destination: 'rtmp://example/live/*****t123',
    });
    const [, destination, profile, loop] = builder.build.mock.calls[0];
    expect(destination.url).toBe('rtmp://example/live/secret123');
    expect(profile.tier).toBe(720);
    expect(loop).toBe(true);
  });

  it('should prefer the destination and tier given in the request', async () => {
    const result = await createUseCase().execute({
      ownerId: '42',
      source: SourceDescriptors.singleFile('clip.mp4'),
      endpoint: 'rtmps://live.example.com/app/',
      streamKey: 'other-key',
      tier: 1080,
      loop: false,
    });

    expect(result.tier).toBe(1080);
    expect(result.destination).toBe('rtmps://live.example.com/app/*****-key');
    expect(builder.build.mock.calls[0][3]).toBe(false);
  });

  it('should fall back to the default tier for an unknown tier', async () => {
    const result = await createUseCase().execute({
      ownerId: '42',
      source: SourceDescriptors.singleFile('clip.mp4'),
      tier: 999,
    });

    expect(result.tier).toBe(720);
  });

  it('should ask for a stream key when none is configured', async () => {
    const execution = createUseCase('').execute({
      ownerId: '42',
      source: SourceDescriptors.singleFile('clip.mp4'),
    });

    await expect(execution).rejects.toBeInstanceOf(ConfigurationMissingError);
    await expect(execution).rejects.toMatchObject({
      userMessage: 'No stream key configured. Set a streaming destination first.',
    });
    expect(launcher.handles).toHaveLength(0);
  });

  it('should use the internal start for service-issued broadcasts', async () => {
    await createUseCase().execute({
      ownerId: '42',
      source: SourceDescriptors.singleFile('clip.mp4'),
      internal: true,
    });
    await flushPromises();

    expect(notify).not.toHaveBeenCalled();
  });

  it('should log and rethrow supervisor failures', async () => {
    launcher.failNext(new Error('spawn ffmpeg ENOENT'));

    await expect(
      createUseCase().execute({ ownerId: '42', source: SourceDescriptors.singleFile('clip.mp4') })
    ).rejects.toThrow('spawn ffmpeg ENOENT');

    expect(logger.error).toHaveBeenCalledWith('Failed to start broadcast', {
      ownerId: '42',
      error: 'spawn ffmpeg ENOENT',
    });
  });
});
