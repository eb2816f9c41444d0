import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('uses defaults when nothing is set', () => {
    expect(loadConfig({})).toEqual({
      controlPort: 3000,
      serial: { baudRate: 115200, ackTimeoutMs: 120000 },
      trigger: { host: '127.0.0.1', port: 6000, protocol: 'udp', payload: 's' },
      timing: { redSeconds: 5, greenSeconds: 9, offSeconds: 11 },
    });
  });

  it('reads overrides and ignores blank values', () => {
    const config = loadConfig({
      CONTROL_PORT: '  ',
      SERIAL_PATH: '/dev/ttyACM0',
      TRIGGER_PROTOCOL: 'tcp',
      TRIGGER_PORT: '6100',
      DEFAULT_VOLUME: '20',
      SIGNAL_OFF_SECONDS: '12.5',
    });

    expect(config.controlPort).toBe(3000);
    expect(config.serial.path).toBe('/dev/ttyACM0');
    expect(config.trigger).toEqual({ host: '127.0.0.1', port: 6100, protocol: 'tcp', payload: 's' });
    expect(config.defaultVolume).toBe(20);
    expect(config.timing.offSeconds).toBe(12.5);
  });

  it('lists invalid values', () => {
    expect(() => loadConfig({ TRIGGER_PROTOCOL: 'http' })).toThrow(/^Invalid configuration: TRIGGER_PROTOCOL: /);
    expect(() => loadConfig({ DEFAULT_VOLUME: '31' })).toThrow(/^Invalid configuration: DEFAULT_VOLUME: /);
  });

  it('rejects signal durations out of order', () => {
    expect(() => loadConfig({ SIGNAL_GREEN_SECONDS: '4' }))
      .toThrow('Signal durations must satisfy 0 < red < green < off, got 5/4/11');
  });
});
