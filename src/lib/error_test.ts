/**
 * Tests for ReleaseError.
 */

import assert from 'node:assert/strict';
import { test } from 'node:test';
import { ReleaseError } from './error.ts';

test('ReleaseError', async (t) => {
  await t.test('creates error with message and code', () => {
    const error = new ReleaseError('Something went wrong', 'TEST_ERROR');

    assert.ok(error instanceof Error);
    assert.ok(error instanceof ReleaseError);
    assert.equal(error.message, 'Something went wrong');
    assert.equal(error.code, 'TEST_ERROR');
    assert.equal(error.name, 'ReleaseError');
    assert.equal(error.details, undefined);
  });

  await t.test('creates error with details', () => {
    const error = new ReleaseError('Invalid version', 'INVALID_VERSION', {
      version: 'a1.0.1',
    });

    assert.equal(error.code, 'INVALID_VERSION');
    assert.deepEqual(error.details, { version: 'a1.0.1' });
  });

  await t.test('has stack trace', () => {
    const error = new ReleaseError('Test', 'TEST');
    assert.equal(typeof error.stack, 'string');
    assert.equal(error.stack?.includes('ReleaseError'), true);
  });

  await t.test('can be caught as Error', () => {
    try {
      throw new ReleaseError('Test error', 'TEST');
    } catch (e) {
      assert.ok(e instanceof Error);
      if (e instanceof ReleaseError) {
        assert.equal(e.code, 'TEST');
      }
    }
  });
});
