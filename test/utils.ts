import assert from 'assert';
import { Mutex } from '@src/utils/sync';
import { cryptoSource } from '@src/utils/random';

describe('Mutex', function() {
  it('runs the function and returns its value', () => {
    const mutex = new Mutex();
    assert.strictEqual(mutex.runExclusive(() => 'value1'), 'value1');
    assert.strictEqual(mutex.locked, false);
  });

  it('is held while the function runs', () => {
    const mutex = new Mutex();
    let seen = false;
    mutex.runExclusive(() => {
      seen = mutex.locked;
    });
    assert.strictEqual(seen, true);
  });

  it('rejects re-entrant acquisition', () => {
    const mutex = new Mutex();
    assert.throws(() => mutex.runExclusive(() => mutex.runExclusive(() => 1)), /mutex is already held/);
    assert.strictEqual(mutex.locked, false);
  });

  it('releases the lock when the function throws', () => {
    const mutex = new Mutex();
    const error = new Error('test error');
    assert.throws(() => mutex.runExclusive(() => { throw error; }), (err: unknown) => err === error);
    assert.strictEqual(mutex.runExclusive(() => 2), 2);
  });
});

describe('cryptoSource', function() {
  it('fills the whole buffer', () => {
    const buf = new Uint8Array(64);
    assert.strictEqual(cryptoSource.read(buf), 64);
    assert(buf.some(b => b !== 0));
  });
});
