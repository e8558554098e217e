import * as os from 'os';
import * as path from 'path';
import { Config } from '../../../src/infrastructure/config/Config';

describe('Config', () => {
  it('should apply defaults for an empty environment', () => {
    const config = Config.fromEnvironment({}).get();

    expect(config.ffmpeg).toEqual({
      binaryPath: 'ffmpeg',
      manifestDir: path.join(os.tmpdir(), 'livecast-manifests'),
    });
    expect(config.destination).toEqual({
      endpoint: 'rtmp://a.rtmp.youtube.com/live2',
      streamKey: '',
    });
    expect(config.supervisor).toEqual({
      maxRestarts: 5,
      restartBackoffMs: 5000,
      terminateTimeoutMs: 5000,
      singleSessionPerOwner: false,
    });
    expect(config.profiles).toEqual({
      defaultTier: 720,
      frameRate: 30,
      videoBitrate: undefined,
      audioBitrate: undefined,
    });
    expect(config.adaptation.enabled).toBe(false);
    expect(config.autostart.sources).toEqual([]);
    expect(config.logging.level).toBe('info');
  });

  it('should read values from the environment', () => {
    const config = Config.fromEnvironment({
      DEFAULT_STREAM_KEY: 'test-secret',
      MAX_AUTO_RESTARTS: '3',
      SINGLE_SESSION_PER_OWNER: 'true',
      VIDEO_BITRATE_OVERRIDE: '3000k',
      ADAPTIVE_QUALITY: 'true',
      CPU_HIGH_WATER: '90',
      CPU_LOW_WATER: '40',
      AUTOSTART_OWNER_ID: '42',
      AUTOSTART_SOURCES: '/media/a.mp4, /media/b.mp4,',
      AUTOSTART_QUALITY: '480',
      LOG_LEVEL: 'DEBUG',
    }).get();

    expect(config.destination.streamKey).toBe('test-secret');
    expect(config.supervisor.maxRestarts).toBe(3);
    expect(config.supervisor.singleSessionPerOwner).toBe(true);
    expect(config.profiles.videoBitrate).toBe('3000k');
    expect(config.adaptation).toEqual({ enabled: true, intervalMs: 30000, highWater: 90, lowWater: 40 });
    expect(config.autostart).toEqual({
      ownerId: '42',
      sources: ['/media/a.mp4', '/media/b.mp4'],
      tier: 480,
      loop: true,
    });
    expect(config.logging.level).toBe('debug');
  });

  it('should report every problem at once', () => {
    expect(() =>
      Config.fromEnvironment({
        MAX_AUTO_RESTARTS: 'many',
        AUTOSTART_SOURCES: '/media/a.mp4',
        LOG_LEVEL: 'loud',
      })
    ).toThrow(
      'Configuration validation failed: MAX_AUTO_RESTARTS must be a non-negative integer, ' +
        'AUTOSTART_OWNER_ID is required when AUTOSTART_SOURCES is set, ' +
        'LOG_LEVEL must be one of: error, warn, info, http, verbose, debug, silly'
    );
  });

  it('should check adaptation thresholds only when enabled', () => {
    const inverted = { CPU_HIGH_WATER: '40', CPU_LOW_WATER: '60' };

    expect(() => Config.fromEnvironment(inverted)).not.toThrow();
    expect(() => Config.fromEnvironment({ ...inverted, ADAPTIVE_QUALITY: 'true' })).toThrow(
      'Configuration validation failed: CPU_LOW_WATER must be below CPU_HIGH_WATER'
    );
  });

  it('should share one instance', () => {
    expect(Config.getInstance()).toBe(Config.getInstance());
  });
});
