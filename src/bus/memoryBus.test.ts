import test from 'node:test';
import assert from 'node:assert/strict';
import { MemoryBus } from './memoryBus';
import { parseFlag } from './types';

test('subscribers receive payload and topic', () => {
  const bus = new MemoryBus();
  const received: string[] = [];
  bus.subscribe('a/b', (payload, topic) => received.push(`${topic}=${payload}`));

  bus.publish('a/b', 'hello');
  bus.publish('a/c', 'ignored');

  assert.deepEqual(received, ['a/b=hello']);
});

test('late subscribers get the retained value', () => {
  const bus = new MemoryBus();
  bus.publish('session/state', 'idle', { retain: true });
  bus.publish('session/state', 'active', { retain: true });
  bus.publish('audio/transcription', 'not retained');

  const states: string[] = [];
  const texts: string[] = [];
  bus.subscribe('session/state', (payload) => states.push(payload));
  bus.subscribe('audio/transcription', (payload) => texts.push(payload));

  assert.deepEqual(states, ['active']);
  assert.deepEqual(texts, []);
});

test('a throwing handler does not stop delivery to others', () => {
  const bus = new MemoryBus();
  const received: string[] = [];
  bus.subscribe('t', () => {
    throw new Error('boom');
  });
  bus.subscribe('t', (payload) => received.push(payload));

  bus.publish('t', 'x');
  assert.deepEqual(received, ['x']);
});

test('a closed bus drops publishes', async () => {
  const bus = new MemoryBus();
  await bus.close();
  bus.publish('t', 'x');
  assert.deepEqual(bus.published, []);
});

test('onConnect listeners run on every reconnect', () => {
  const bus = new MemoryBus();
  let connects = 0;
  bus.onConnect(() => connects++);
  bus.simulateReconnect();
  bus.simulateReconnect();
  assert.equal(connects, 2);
});

test('parseFlag accepts only true and false', () => {
  assert.equal(parseFlag('true'), true);
  assert.equal(parseFlag(' False\n'), false);
  assert.equal(parseFlag('1'), null);
  assert.equal(parseFlag(''), null);
});
