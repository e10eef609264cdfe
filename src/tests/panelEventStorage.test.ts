import { describe, it } from 'node:test';
import { strict as assert } from 'assert';
import { EventEmitter } from 'events';
import { PanelEventStorage, QueryFn, isPanelEventType } from '../storage/panelEventStorage';

const recorder = () => {
  const calls: Array<{ text: string; params: unknown[] }> = [];
  const query: QueryFn = async (text, params = []) => {
    calls.push({ text, params });
    return { rows: [], rowCount: 0 };
  };
  return { calls, query };
};

// Lets queued background writes settle
const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('PanelEventStorage', () => {
  it('inserts an event with its payload serialized', async () => {
    const { calls, query } = recorder();
    const storage = new PanelEventStorage(query);

    await storage.record({
      eventType: 'system_reset',
      label: 'SYSTEM RESET',
      occurredAt: Date.UTC(2024, 2, 1, 10, 0, 0)
    });

    assert.equal(calls.length, 1);
    assert.match(calls[0].text, /^INSERT INTO panel_events/);
    assert.deepEqual(calls[0].params, ['system_reset', 'SYSTEM RESET', null, null, '{}', '2024-03-01T10:00:00.000Z']);
  });

  it('filters recent events by type and clamps the limit', async () => {
    const { calls, query } = recorder();
    const storage = new PanelEventStorage(query);

    await storage.recent(10_000, 'mode_change');

    assert.equal(
      calls[0].text,
      'SELECT id, event_type, label, severity, source, payload, occurred_at FROM panel_events WHERE event_type = $1 ORDER BY occurred_at DESC, id DESC LIMIT $2'
    );
    assert.deepEqual(calls[0].params, ['mode_change', 500]);
  });

  it('records engine events in the background', async () => {
    const { calls, query } = recorder();
    const storage = new PanelEventStorage(query);
    const engine = new EventEmitter();
    storage.attachTo(engine);

    engine.emit('mode-change', { mode: 'push', previous: 'socket', at: Date.UTC(2024, 2, 1) });
    engine.emit('episode-end', { at: Date.UTC(2024, 2, 1), alarmZones: [10], troubleZones: [], bells: [3] });
    await flush();

    assert.deepEqual(
      calls.map((call) => call.params.slice(0, 5)),
      [
        ['mode_change', null, null, 'push', '{"previous":"socket"}'],
        ['episode_end', 'ALARM OFF', null, null, '{"alarmZones":[10],"troubleZones":[],"bells":[3]}']
      ]
    );
    assert.deepEqual(storage.getStats(), { pending: 0, failures: 0 });
  });

  it('counts failed background writes', async () => {
    const storage = new PanelEventStorage(async () => {
      throw new Error('connection refused');
    });
    const originalError = console.error;
    console.error = () => undefined;
    try {
      storage.recordInBackground({ eventType: 'system_reset', occurredAt: 0 });
      await flush();
    } finally {
      console.error = originalError;
    }
    assert.deepEqual(storage.getStats(), { pending: 0, failures: 1 });
  });

  it('recognises event type names', () => {
    assert.equal(isPanelEventType('status_change'), true);
    assert.equal(isPanelEventType('bogus'), false);
  });
});
