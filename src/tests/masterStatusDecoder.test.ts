import { describe, it } from 'node:test';
import { strict as assert } from 'assert';
import { MasterStatusDecoder, parseMasterFlag } from '../protocol/masterStatusDecoder';
import { MASTER_FLAGS, MasterFlag } from '../types/panel';

describe('MasterStatusDecoder', () => {
  it('turns every indicator on when every status bit is clear', () => {
    const status = MasterStatusDecoder.decode('4200', 1000);
    assert(status);
    assert.equal(status.header, 0x42);
    assert.equal(status.statusByte, 0x00);
    for (const flag of MASTER_FLAGS) {
      assert.equal(MasterStatusDecoder.getFlag(status, flag), true, `${flag} should be on`);
    }
  });

  it('turns every indicator off when every status bit is set', () => {
    const status = MasterStatusDecoder.decode('41FF', 1000);
    assert(status);
    assert.equal(status.statusByte, 0xFF);
    for (const flag of MASTER_FLAGS) {
      assert.equal(MasterStatusDecoder.getFlag(status, flag), false, `${flag} should be off`);
    }
  });

  it('maps each clear bit to its own indicator', () => {
    const alarmOnly = MasterStatusDecoder.decode('41EF', 1000);
    assert(alarmOnly);
    assert.equal(alarmOnly.alarm, true);
    assert.equal(alarmOnly.trouble, false);
    assert.equal(alarmOnly.acPower, false);

    const acOnly = MasterStatusDecoder.decode('41BF', 1000);
    assert(acOnly);
    assert.equal(acOnly.acPower, true);
    assert.equal(acOnly.dcPower, false);

    const drillAndSilenced = MasterStatusDecoder.decode('41F9', 1000);
    assert(drillAndSilenced);
    assert.equal(drillAndSilenced.drill, true);
    assert.equal(drillAndSilenced.silenced, true);
    assert.equal(drillAndSilenced.disabled, false);
  });

  it('returns null for malformed words', () => {
    assert.equal(MasterStatusDecoder.decode('41F'), null);
    assert.equal(MasterStatusDecoder.decode('41FFF'), null);
    assert.equal(MasterStatusDecoder.decode('ZZZZ'), null);
    assert.equal(MasterStatusDecoder.decode(''), null);
  });

  it('decodes the same word to the same status every time', () => {
    const first = MasterStatusDecoder.decode('41d7', 5000);
    const second = MasterStatusDecoder.decode('41d7', 5000);
    assert.deepEqual(first, second);
    assert.equal(first?.rawWord, '41D7');
  });

  it('does not carry anything over from a previous decode', () => {
    MasterStatusDecoder.decode('4200', 1000);
    const next = MasterStatusDecoder.decode('41FF', 2000);
    assert(next);
    assert.deepEqual(
      MASTER_FLAGS.map((flag) => MasterStatusDecoder.getFlag(next, flag)),
      [false, false, false, false, false, false, false]
    );
  });

  it('parses flag names case-insensitively and rejects unknown names', () => {
    assert.equal(parseMasterFlag('ALARM'), MasterFlag.ALARM);
    assert.equal(parseMasterFlag(' acPower '), MasterFlag.AC_POWER);
    assert.equal(parseMasterFlag('dcpower'), MasterFlag.DC_POWER);
    assert.equal(parseMasterFlag('fire'), null);
  });
});
