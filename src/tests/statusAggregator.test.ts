import { describe, it } from 'node:test';
import { strict as assert } from 'assert';
import { LabelInputs, StatusAggregator } from '../status/statusAggregator';
import { MasterStatusDecoder } from '../protocol/masterStatusDecoder';
import { StatusLabel, StatusSeverity, ZoneCondition, ZoneStatus } from '../types/panel';

const NOW = 100_000;

const inputs = (word: string | null, overrides: Partial<LabelInputs> = {}): LabelInputs => ({
  resetting: false,
  loading: false,
  master: word === null ? null : MasterStatusDecoder.decode(word, NOW),
  persistedTrouble: false,
  alarmZoneCount: 0,
  lastTelegramAt: NOW,
  configuredZones: 315,
  noDataTimeoutMs: 10_000,
  now: NOW,
  ...overrides
});

const label = (word: string | null, overrides: Partial<LabelInputs> = {}) =>
  StatusAggregator.computeLabel(inputs(word, overrides));

describe('StatusAggregator.computeLabel', () => {
  it('falls back to normal', () => {
    assert.equal(label('41FF'), StatusLabel.SYSTEM_NORMAL);
  });

  it('puts reset and loading above everything', () => {
    assert.equal(label('41EF', { resetting: true, loading: true }), StatusLabel.SYSTEM_RESETTING);
    assert.equal(label('41EF', { loading: true }), StatusLabel.LOADING);
  });

  it('ranks drill above alarm', () => {
    assert.equal(label('41EB'), StatusLabel.ALARM_DRILL);
    assert.equal(label('41EF'), StatusLabel.ALARM);
  });

  it('raises alarm from zones even when the LED is off', () => {
    assert.equal(label('41FF', { alarmZoneCount: 2 }), StatusLabel.ALARM);
  });

  it('uses the persisted trouble state, not the raw LED', () => {
    assert.equal(label('41F7'), StatusLabel.SYSTEM_NORMAL);
    assert.equal(label('41FF', { persistedTrouble: true }), StatusLabel.SYSTEM_TROUBLE);
  });

  it('orders silenced above disabled', () => {
    assert.equal(label('41FD'), StatusLabel.SYSTEM_SILENCED);
    assert.equal(label('41FE'), StatusLabel.SYSTEM_DISABLED);
    assert.equal(label('41FC'), StatusLabel.SYSTEM_SILENCED);
  });

  it('reports no data after the timeout, without a master word or without zones', () => {
    assert.equal(label('41FF', { lastTelegramAt: NOW - 9_999 }), StatusLabel.SYSTEM_NORMAL);
    assert.equal(label('41FF', { lastTelegramAt: NOW - 10_000 }), StatusLabel.NO_DATA);
    assert.equal(label(null), StatusLabel.NO_DATA);
    assert.equal(label('41FF', { configuredZones: 0 }), StatusLabel.NO_DATA);
    assert.equal(label('41FF', { lastTelegramAt: null }), StatusLabel.NO_DATA);
  });

  it('keeps trouble above no data', () => {
    assert.equal(label('41FF', { persistedTrouble: true, lastTelegramAt: NOW - 60_000 }), StatusLabel.SYSTEM_TROUBLE);
  });
});

describe('StatusAggregator styling', () => {
  it('maps labels to fixed severity and color', () => {
    assert.deepEqual(StatusAggregator.describe(StatusLabel.ALARM), {
      text: 'ALARM',
      severity: StatusSeverity.CRITICAL,
      color: 'red'
    });
    assert.deepEqual(StatusAggregator.describe(StatusLabel.SYSTEM_NORMAL), {
      text: 'SYSTEM NORMAL',
      severity: StatusSeverity.LOW,
      color: 'green'
    });
    assert.equal(StatusAggregator.describe(StatusLabel.NO_DATA).severity, StatusSeverity.UNKNOWN);
  });

  it('reports SYSTEM ERROR when the inputs cannot be computed', () => {
    const result = StatusAggregator.aggregate(() => {
      throw new Error('cache unavailable');
    });
    assert.equal(result.text, StatusLabel.SYSTEM_ERROR);
    assert.equal(result.severity, StatusSeverity.CRITICAL);
  });
});

describe('StatusAggregator.countZones', () => {
  it('counts each condition', () => {
    const make = (zoneNumber: number, hasAlarm: boolean, hasTrouble: boolean, isActive: boolean): ZoneStatus => ({
      zoneNumber,
      deviceAddress: 1,
      zoneInDevice: zoneNumber,
      hasAlarm,
      hasTrouble,
      isActive,
      condition: ZoneCondition.NORMAL,
      description: '',
      updatedAt: NOW
    });

    const counts = StatusAggregator.countZones([
      make(1, true, true, false),
      make(2, false, true, false),
      make(3, false, false, true),
      make(4, false, false, false)
    ]);
    assert.deepEqual(counts, { alarm: 1, trouble: 2, active: 1, normal: 1, total: 4 });
  });
});
