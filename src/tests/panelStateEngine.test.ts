import { describe, it } from 'node:test';
import { strict as assert } from 'assert';
import {
  EpisodeEvent,
  ModeChangeEvent,
  PanelSnapshot,
  PanelStateEngine,
  StatusChange,
  TelegramRejection
} from '../ingest/panelStateEngine';
import { BellConfirmation, MASTER_FLAGS, MasterFlag, StatusLabel, ZoneCondition } from '../types/panel';
import { ManualScheduler } from '../utils/clock';

const setup = () => {
  const scheduler = new ManualScheduler();
  const engine = new PanelStateEngine({ ingestMode: 'socket' }, scheduler);
  return { scheduler, engine };
};

describe('PanelStateEngine decoding', () => {
  it('turns every master flag on for 4200', () => {
    const { engine } = setup();
    engine.ingest('4200', 'socket');
    for (const flag of MASTER_FLAGS) {
      assert.equal(engine.getMasterFlag(flag), true, flag);
    }
  });

  it('stores zone 3 as alarm and ignores device 64', () => {
    const { engine } = setup();
    engine.ingest('41FF <STX>010004<STX>640004<ETX>', 'socket');

    assert.equal(engine.getZoneStatus(3)?.condition, ZoneCondition.ALARM);
    assert.equal(engine.getZoneStatus(4)?.condition, ZoneCondition.NORMAL);
    assert.equal(engine.getZoneStatus(316), null);
    assert.deepEqual(engine.getActiveAlarmZones(), [3]);
    assert.equal(engine.getStats().rejections.out_of_range_address, 1);
    assert.equal(engine.getAggregatedLabel().text, StatusLabel.ALARM);
  });

  it('keeps the previous state when a telegram is malformed', () => {
    const { engine } = setup();
    const rejections: TelegramRejection[] = [];
    engine.on('telegram-rejected', (rejection: TelegramRejection) => rejections.push(rejection));

    engine.ingest('41FF <STX>010004<ETX>', 'socket');
    engine.ingest('ZZ', 'socket');

    assert.equal(engine.getZoneStatus(3)?.condition, ZoneCondition.ALARM);
    assert.equal(rejections.length, 1);
    assert.equal(rejections[0].kind, 'malformed_telegram');
    assert.equal(rejections[0].raw, 'ZZ');
    assert.equal(engine.getStats().rejections.malformed_telegram, 1);
    assert.equal(engine.getStats().telegramsAccepted, 1);
  });

  it('rejects a conflicting batch together with its master word', () => {
    const { engine } = setup();
    engine.ingest('41FF', 'socket');
    engine.ingest('41EF <STX>010004<STX>010000<ETX>', 'socket');

    assert.equal(engine.getMasterStatus()?.alarm, false);
    assert.equal(engine.getZoneStatus(1), null);
    assert.equal(engine.getStats().rejections.integrity_violation, 1);
  });

  it('uses configured zone names', () => {
    const { engine } = setup();
    engine.setZoneName(3, 'Server room');
    engine.ingest('41FF <STX>010004<ETX>', 'socket');
    assert.equal(engine.getZoneStatus(3)?.description, 'Server room');

    engine.setZoneName(4, 'Lobby');
    assert.equal(engine.getZoneStatus(4)?.description, 'Lobby');
    engine.setZoneName(4, ' ');
    assert.equal(engine.getZoneStatus(4)?.description, 'Device 01 Zone 4');
  });
});

describe('PanelStateEngine accumulation', () => {
  it('remembers a self-cleared zone for the whole alarm episode only', () => {
    const { engine } = setup();
    const starts: EpisodeEvent[] = [];
    const ends: EpisodeEvent[] = [];
    engine.on('episode-start', (episode: EpisodeEvent) => starts.push(episode));
    engine.on('episode-end', (episode: EpisodeEvent) => ends.push(episode));

    engine.ingest('41EF', 'socket');
    engine.ingest('41EF <STX>020010<ETX>', 'socket');
    assert.equal(engine.isZoneAccumulatedAlarm(10), true);

    engine.ingest('41EF <STX>020000<ETX>', 'socket');
    assert.deepEqual(engine.getActiveAlarmZones(), []);
    assert.equal(engine.isZoneAccumulatedAlarm(10), true);
    assert.deepEqual(engine.getAccumulatedCounts(), { alarmCount: 1, troubleCount: 0, bellCount: 0, isAccumulating: true });

    engine.ingest('41FF', 'socket');
    assert.equal(engine.isZoneAccumulatedAlarm(10), false);
    assert.deepEqual(engine.getAccumulatedCounts(), { alarmCount: 0, troubleCount: 0, bellCount: 0, isAccumulating: false });
    assert.deepEqual(ends.map((episode) => episode.alarmZones), [[10]]);

    engine.ingest('41EF', 'socket');
    assert.deepEqual(engine.getAccumulatedCounts(), { alarmCount: 0, troubleCount: 0, bellCount: 0, isAccumulating: true });
    assert.equal(starts.length, 2);
  });

  it('tracks bell confirmations and discards stale ones', () => {
    const { engine, scheduler } = setup();
    const bells: BellConfirmation[] = [];
    engine.on('bell-confirmation', (confirmation: BellConfirmation) => bells.push(confirmation));

    engine.ingest('41EF <STX>030020<ETX>$8503', 'socket');
    assert.deepEqual(bells.map((c) => [c.deviceAddress, c.isActive, c.rawToken]), [[3, true, '$8503']]);
    assert.deepEqual(engine.getBellStatus().active, [3]);
    assert.deepEqual(engine.getBellStatus().accumulated, [3]);
    assert.equal(engine.getAccumulatedCounts().bellCount, 1);
    assert.equal(engine.getZoneStatus(11)?.condition, ZoneCondition.ACTIVE);

    scheduler.advance(2000);
    assert.deepEqual(engine.getBellStatus().active, []);
    assert.deepEqual(engine.getBellStatus().accumulated, [3]);

    engine.ingest('41FF $8504', 'socket');
    assert.equal(engine.getStats().rejections.stale_confirmation, 1);
    assert.deepEqual(engine.getBellStatus().active, []);
    assert.deepEqual(engine.getBellStatus().accumulated, []);
    assert.equal(bells.length, 1);
  });

  it('keeps the master word and record when a bell token precedes the record', () => {
    const { engine } = setup();
    engine.ingest('41EF $85 010001', 'socket');

    assert.equal(engine.getMasterStatus()?.alarm, true);
    assert.equal(engine.getZoneStatus(1)?.condition, ZoneCondition.ALARM);
    assert.deepEqual(engine.getBellStatus().active, [1]);
    assert.equal(engine.getStats().rejections.malformed_telegram, 0);
  });
});

describe('PanelStateEngine ingestion modes', () => {
  it('drops the inactive source and resets state on a mode change', () => {
    const { engine } = setup();
    const modeChanges: ModeChangeEvent[] = [];
    engine.on('mode-change', (change: ModeChangeEvent) => modeChanges.push(change));

    engine.ingest('41EF <STX>010004<ETX>', 'socket');
    engine.ingest('41EF <STX>020010<ETX>', 'push');
    assert.equal(engine.getZoneStatus(10), null);
    assert.equal(engine.getStats().router.sources.push.dropped, 1);
    assert.equal(engine.isZoneAccumulatedAlarm(3), true);

    engine.onModeChanged('push');
    assert.equal(engine.getMode(), 'push');
    assert.equal(engine.getZoneStatus(3), null);
    assert.deepEqual(engine.getAccumulatedCounts(), { alarmCount: 0, troubleCount: 0, bellCount: 0, isAccumulating: false });
    assert.equal(engine.getMasterStatus()?.alarm, true);
    assert.deepEqual(modeChanges.map((change) => [change.mode, change.previous]), [['push', 'socket']]);

    engine.ingest('41EF <STX>020010<ETX>', 'push');
    assert.equal(engine.getZoneStatus(10)?.condition, ZoneCondition.ALARM);
    assert.equal(engine.isZoneAccumulatedAlarm(10), true);
  });

  it('narrows the zone range when the device count shrinks', () => {
    const { engine } = setup();
    engine.ingest('41FF <STX>010000<STX>020100<ETX>', 'socket');
    assert.deepEqual(engine.getActiveTroubleZones(), [6]);

    assert.equal(engine.setDeviceCount(1), 1);
    assert.equal(engine.getZoneStatus(6), null);
    assert.deepEqual(engine.getActiveTroubleZones(), []);
    assert.equal(engine.getZoneStatus(3)?.condition, ZoneCondition.NORMAL);

    engine.ingest('41FF <STX>020100<ETX>', 'socket');
    assert.deepEqual(engine.getActiveTroubleZones(), []);

    assert.equal(engine.setDeviceCount(100), 63);
  });

  it('drops accumulated zones beyond a reduced device count', () => {
    const { engine } = setup();
    engine.ingest('41EF <STX>010004<STX>020010<ETX>', 'socket');
    assert.equal(engine.getAccumulatedCounts().alarmCount, 2);

    engine.setDeviceCount(1);
    assert.equal(engine.isZoneAccumulatedAlarm(10), false);
    assert.deepEqual(engine.getAccumulatedZones().alarm, [3]);
    assert.deepEqual(engine.getAccumulatedCounts(), { alarmCount: 1, troubleCount: 0, bellCount: 0, isAccumulating: true });
  });
});

describe('PanelStateEngine status label', () => {
  it('reports NO DATA before the first telegram', () => {
    const { engine } = setup();
    assert.equal(engine.getAggregatedLabel().text, StatusLabel.NO_DATA);
  });

  it('holds SYSTEM TROUBLE through the persistence period', () => {
    const { engine, scheduler } = setup();
    const labels: string[] = [];
    engine.on('status-change', (change: StatusChange) => labels.push(change.current.text));

    engine.ingest('41F7', 'socket');
    assert.equal(engine.getAggregatedLabel().text, StatusLabel.SYSTEM_TROUBLE);

    scheduler.advance(1000);
    engine.ingest('41FF', 'socket');
    assert.equal(engine.getAggregatedLabel().text, StatusLabel.SYSTEM_TROUBLE);

    scheduler.advance(6999);
    assert.equal(engine.getAggregatedLabel().text, StatusLabel.SYSTEM_TROUBLE);
    scheduler.advance(1);
    assert.equal(engine.getAggregatedLabel().text, StatusLabel.SYSTEM_NORMAL);
    assert.deepEqual(labels, ['SYSTEM TROUBLE', 'SYSTEM NORMAL']);
  });

  it('marks zones offline and reports NO DATA once telegrams stop', () => {
    const { engine, scheduler } = setup();
    engine.ingest('41FF <STX>010004<ETX>', 'socket');
    assert.equal(engine.getAggregatedLabel().text, StatusLabel.ALARM);

    scheduler.advance(10_000);
    assert.equal(engine.getZoneStatus(3)?.condition, ZoneCondition.OFFLINE);
    assert.deepEqual(engine.getActiveAlarmZones(), []);
    assert.equal(engine.getAggregatedLabel().text, StatusLabel.NO_DATA);
  });

  it('shows SYSTEM RESETTING for the reset display time', () => {
    const { engine, scheduler } = setup();
    engine.ingest('41FF', 'socket');
    engine.beginSystemReset();
    assert.equal(engine.getAggregatedLabel().text, StatusLabel.SYSTEM_RESETTING);

    scheduler.advance(2999);
    assert.equal(engine.getAggregatedLabel().text, StatusLabel.SYSTEM_RESETTING);
    scheduler.advance(1);
    assert.equal(engine.getAggregatedLabel().text, StatusLabel.SYSTEM_NORMAL);
  });

  it('shows LOADING during the startup grace period', () => {
    const { engine, scheduler } = setup();
    engine.start();
    engine.ingest('41FF', 'socket');
    assert.equal(engine.getAggregatedLabel().text, StatusLabel.LOADING);

    scheduler.advance(4999);
    assert.equal(engine.getAggregatedLabel().text, StatusLabel.LOADING);
    scheduler.advance(1);
    assert.equal(engine.getAggregatedLabel().text, StatusLabel.SYSTEM_NORMAL);

    engine.stop();
    assert.equal(scheduler.pendingCount(), 0);
  });

  it('serves master flags through the query governor', () => {
    const { engine, scheduler } = setup();
    engine.ingest('41FF', 'socket');
    assert.equal(engine.getMasterFlag(MasterFlag.ALARM), false);

    engine.ingest('41EF', 'socket');
    assert.equal(engine.getMasterFlag(MasterFlag.ALARM), false);

    scheduler.advance(500);
    assert.equal(engine.getMasterFlag(MasterFlag.ALARM), true);
  });

  it('emits a snapshot after each accepted telegram', () => {
    const { engine } = setup();
    const snapshots: PanelSnapshot[] = [];
    engine.on('snapshot', (snapshot: PanelSnapshot) => snapshots.push(snapshot));

    engine.ingest('41FF <STX>010004<ETX>', 'socket');
    assert.equal(snapshots.length, 1);
    assert.deepEqual(snapshots[0].activeAlarmZones, [3]);
    assert.equal(snapshots[0].label.text, StatusLabel.ALARM);
    assert.equal(snapshots[0].master?.rawWord, '41FF');
  });
});
