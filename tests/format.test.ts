import { test } from 'node:test';
import assert from 'node:assert/strict';
import { hrBytes } from '../src/format';

test('hrBytes: plain bytes below 1000', () => {
  assert.equal(hrBytes(0), '0 B');
  assert.equal(hrBytes(999), '999 B');
});

test('hrBytes: base-1000 units with one decimal', () => {
  assert.equal(hrBytes(1000), '1.0 KB');
  assert.equal(hrBytes(1536), '1.5 KB');
  assert.equal(hrBytes(2500000), '2.5 MB');
  assert.equal(hrBytes(3000000000), '3.0 GB');
});
