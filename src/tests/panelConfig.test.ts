import { describe, it } from 'node:test';
import { strict as assert } from 'assert';
import { DEFAULT_PANEL_CONFIG, loadConfig } from '../config/panelConfig';

describe('loadConfig', () => {
  it('falls back to defaults on an empty environment', () => {
    const config = loadConfig({});
    assert.equal(config.ingestMode, 'socket');
    assert.equal(config.protocol, 'aabbcc');
    assert.equal(config.deviceCount, 63);
    assert.equal(config.troublePersistMs, DEFAULT_PANEL_CONFIG.troublePersistMs);
    assert.equal(config.telegramTcpPort, 7620);
    assert.equal(config.supabaseUrl, null);
    assert.equal(config.supabaseTelegramTable, 'panel_telegrams');
    assert.equal(config.eventLogEnabled, true);
  });

  it('reads and bounds environment overrides', () => {
    const config = loadConfig({
      INGEST_MODE: 'PUSH',
      PANEL_PROTOCOL: 'packed16',
      DEVICE_COUNT: '100',
      NO_DATA_TIMEOUT_MS: 'soon',
      EVENT_LOG_ENABLED: 'off',
      SUPABASE_URL: 'http://127.0.0.1:54321'
    });
    assert.equal(config.ingestMode, 'push');
    assert.equal(config.protocol, 'packed16');
    assert.equal(config.deviceCount, 63);
    assert.equal(config.noDataTimeoutMs, 10_000);
    assert.equal(config.eventLogEnabled, false);
    assert.equal(config.supabaseUrl, 'http://127.0.0.1:54321');
  });

  it('replaces an unknown protocol with the default', () => {
    const originalWarn = console.warn;
    console.warn = () => undefined;
    try {
      assert.equal(loadConfig({ PANEL_PROTOCOL: 'v9' }).protocol, 'aabbcc');
    } finally {
      console.warn = originalWarn;
    }
  });
});
