/**
 * Tests for the turn state machine.
 *
 * The generator and speech path are in-process fakes; timing is driven with
 * deferred promises so each test decides exactly where a turn is suspended.
 */

import { ConversationState } from '../src/core/conversationState.js';
import { TurnController } from '../src/core/turnController.js';
import { OutboundMessage, ResponseGenerator, UtterancePolicy } from '../src/core/types.js';
import {
  dataOf,
  deferred,
  FakeGenerator,
  fixedGenerator,
  RecordingSpeechOutput,
  tick,
} from './fakes.js';

interface Harness {
  controller: TurnController;
  conversation: ConversationState;
  speech: RecordingSpeechOutput;
  published: OutboundMessage[];
}

function setup(
  generator: ResponseGenerator,
  options: { utterancePolicy?: UtterancePolicy; historyLimit?: number; speech?: RecordingSpeechOutput } = {},
): Harness {
  const conversation = new ConversationState();
  const speech = options.speech ?? new RecordingSpeechOutput();
  const published: OutboundMessage[] = [];
  const controller = new TurnController({
    sessionId: 'session-1',
    conversation,
    generator,
    speech,
    publish: (message) => published.push(message),
    historyLimit: options.historyLimit ?? 20,
    utterancePolicy: options.utterancePolicy ?? 'interrupt',
  });
  return { controller, conversation, speech, published };
}

/** First call yields "One" then waits on `hold`; later calls answer at once. */
function heldGenerator(hold: Promise<void>): FakeGenerator {
  return new FakeGenerator(async function* (utterance) {
    if (utterance === 'first') {
      yield 'One';
      await hold;
      yield ' more';
      return;
    }
    yield 'Second';
    yield ' reply';
  });
}

// ─── Completed turns ────────────────────────────────────────────────────────

describe('completed turns', () => {
  test('forwards fragments in order and commits the assistant text', async () => {
    const { controller, speech, published } = setup(fixedGenerator(['Hi', ' there']));

    const outcome = await controller.submitUtterance('hello');

    expect(outcome).toEqual({ turnId: 1, status: 'complete', reason: 'completed', fragmentCount: 2 });
    expect(speech.spoken(1)).toEqual([
      [0, 'Hi'],
      [1, ' there'],
    ]);
    expect(controller.history()).toEqual([
      { role: 'user', text: 'hello' },
      { role: 'assistant', text: 'Hi there' },
    ]);
    expect(published.map((message) => message.type)).toEqual([
      'bot-llm-started',
      'bot-llm-text',
      'bot-llm-text',
      'bot-llm-stopped',
    ]);
    expect(dataOf(published[0])).toEqual({ turn_id: 1 });
    expect(dataOf(published[1])).toEqual({ text: 'Hi', turn_id: 1, sequence: 0 });
    expect(dataOf(published[3])).toEqual({ turn_id: 1 });
    expect(controller.phase).toBe('idle');
    expect(controller.activeTurn).toBeNull();
  });

  test('emits the turn start before any fragment and exactly one turn end', async () => {
    const { controller, speech } = setup(fixedGenerator(['a', 'b']));

    await controller.submitUtterance('go');

    expect(speech.records.map((record) => record.kind)).toEqual(['begin', 'speak', 'speak', 'end']);
  });

  test('skips empty fragments without consuming a sequence number', async () => {
    const { controller, speech } = setup(fixedGenerator(['A', '', 'B']));

    const outcome = await controller.submitUtterance('go');

    expect(outcome?.fragmentCount).toBe(2);
    expect(speech.spoken(1)).toEqual([
      [0, 'A'],
      [1, 'B'],
    ]);
    expect(controller.history()[1]).toEqual({ role: 'assistant', text: 'AB' });
  });

  test('a turn with no fragments completes without an assistant entry', async () => {
    const { controller, published } = setup(fixedGenerator([]));

    const outcome = await controller.submitUtterance('hello');

    expect(outcome).toEqual({ turnId: 1, status: 'complete', reason: 'completed', fragmentCount: 0 });
    expect(controller.history()).toEqual([{ role: 'user', text: 'hello' }]);
    expect(published.map((message) => message.type)).toEqual(['bot-llm-started', 'bot-llm-stopped']);
  });

  test('ignores blank utterances', async () => {
    const generator = fixedGenerator(['x']);
    const { controller, speech } = setup(generator);

    await expect(controller.submitUtterance('   ')).resolves.toBeNull();
    expect(generator.calls).toHaveLength(0);
    expect(speech.records).toHaveLength(0);
  });

  test('passes the bounded history that precedes the utterance', async () => {
    const generator = fixedGenerator(['ok']);
    const { controller } = setup(generator, { historyLimit: 2 });

    await controller.submitUtterance('one');
    await controller.submitUtterance('two');
    await controller.submitUtterance('three');

    expect(generator.calls[0]).toEqual({ history: [], utterance: 'one' });
    expect(generator.calls[2]).toEqual({
      history: [
        { role: 'user', text: 'two' },
        { role: 'assistant', text: 'ok' },
      ],
      utterance: 'three',
    });
  });

  test('turn ids increase across turns', async () => {
    const { controller } = setup(fixedGenerator(['ok']));

    const first = await controller.submitUtterance('one');
    const second = await controller.submitUtterance('two');

    expect(first?.turnId).toBe(1);
    expect(second?.turnId).toBe(2);
  });
});

// ─── Cancellation ───────────────────────────────────────────────────────────

describe('cancellation', () => {
  test('cancel while streaming ends the turn without committing', async () => {
    const hold = deferred();
    const { controller, speech, published } = setup(heldGenerator(hold.promise));

    const run = controller.submitUtterance('first');
    await tick();

    expect(controller.phase).toBe('streaming');
    expect(controller.activeTurn).toEqual({
      id: 1,
      status: 'streaming',
      accumulatedText: 'One',
      fragmentCount: 1,
    });

    expect(controller.cancel()).toBe(true);
    expect(controller.phase).toBe('cancelled');

    const outcome = await run;
    hold.resolve();

    expect(outcome).toEqual({ turnId: 1, status: 'cancelled', reason: 'interrupted', fragmentCount: 1 });
    expect(controller.history()).toEqual([{ role: 'user', text: 'first' }]);
    expect(speech.records[speech.records.length - 1]).toEqual({ kind: 'end', outcome });
    expect(speech.spoken(1)).toEqual([[0, 'One']]);
    expect(published.map((message) => message.type)).toEqual(['bot-llm-started', 'bot-llm-text']);
    expect(controller.phase).toBe('idle');
  });

  test('cancel is a no-op when idle or already cancelling', async () => {
    const hold = deferred();
    const { controller } = setup(heldGenerator(hold.promise));

    expect(controller.cancel()).toBe(false);

    const run = controller.submitUtterance('first');
    await tick();

    expect(controller.cancel('interrupted')).toBe(true);
    expect(controller.cancel('superseded')).toBe(false);

    const outcome = await run;
    hold.resolve();
    expect(outcome?.reason).toBe('interrupted');
  });

  test('aborts a pending speak call when the output supports it', async () => {
    const speech = new RecordingSpeechOutput(true);
    const signals: AbortSignal[] = [];
    speech.speakImpl = (_fragment, signal) => {
      signals.push(signal);
      return new Promise<void>(() => undefined);
    };
    const { controller } = setup(fixedGenerator(['a', 'b']), { speech });

    const run = controller.submitUtterance('go');
    await tick();
    controller.cancel();

    const outcome = await run;
    expect(outcome).toEqual({ turnId: 1, status: 'cancelled', reason: 'interrupted', fragmentCount: 1 });
    expect(signals[0].aborted).toBe(true);
  });

  test('waits for an in-progress speak call when the output cannot abort', async () => {
    const speech = new RecordingSpeechOutput(false);
    const gate = deferred();
    speech.speakImpl = () => gate.promise;
    const { controller } = setup(fixedGenerator(['a', 'b']), { speech });

    const run = controller.submitUtterance('go');
    await tick();
    controller.cancel();

    let settled = false;
    void run.then(() => {
      settled = true;
    });
    await tick();
    expect(settled).toBe(false);

    gate.resolve();
    const outcome = await run;

    expect(outcome).toEqual({ turnId: 1, status: 'cancelled', reason: 'interrupted', fragmentCount: 1 });
    expect(speech.spoken(1)).toEqual([[0, 'a']]);
  });

  test('cancel while the turn start is pending ends the turn without generating', async () => {
    const speech = new RecordingSpeechOutput(true);
    const signals: AbortSignal[] = [];
    speech.beginImpl = (_turnId, signal) => {
      signals.push(signal);
      return new Promise<void>(() => undefined);
    };
    const generator = fixedGenerator(['a']);
    const { controller, published } = setup(generator, { speech });

    const run = controller.submitUtterance('go');
    expect(controller.phase).toBe('pending');
    expect(controller.cancel()).toBe(true);

    const outcome = await run;

    expect(outcome).toEqual({ turnId: 1, status: 'cancelled', reason: 'interrupted', fragmentCount: 0 });
    expect(signals[0].aborted).toBe(true);
    expect(speech.records).toEqual([{ kind: 'begin', turnId: 1 }, { kind: 'end', outcome }]);
    expect(generator.calls).toHaveLength(0);
    expect(published).toHaveLength(0);
    expect(controller.phase).toBe('idle');
  });

  test('close finishes while the turn start and turn end never settle', async () => {
    const speech = new RecordingSpeechOutput(true);
    speech.beginImpl = () => new Promise<void>(() => undefined);
    speech.endImpl = () => new Promise<void>(() => undefined);
    const { controller } = setup(fixedGenerator(['a']), { speech });

    const run = controller.submitUtterance('go');
    await controller.close();

    await expect(run).resolves.toEqual({
      turnId: 1,
      status: 'cancelled',
      reason: 'session_closed',
      fragmentCount: 0,
    });
    expect(speech.records.map((record) => record.kind)).toEqual(['begin', 'end']);
  });

  test('a speak call failing after close reports the close, not an output failure', async () => {
    const speech = new RecordingSpeechOutput(false);
    const gate = deferred();
    speech.speakImpl = () => gate.promise;
    const { controller } = setup(fixedGenerator(['a', 'b']), { speech });

    const run = controller.submitUtterance('go');
    await tick();
    const closing = controller.close();
    gate.reject(new Error('socket closed'));
    await closing;

    await expect(run).resolves.toEqual({
      turnId: 1,
      status: 'cancelled',
      reason: 'session_closed',
      fragmentCount: 1,
    });
  });

  test('close cancels the turn in flight and refuses later utterances', async () => {
    const hold = deferred();
    const { controller, speech } = setup(heldGenerator(hold.promise));

    const run = controller.submitUtterance('first');
    await tick();
    await controller.close();
    hold.resolve();

    await expect(run).resolves.toEqual({
      turnId: 1,
      status: 'cancelled',
      reason: 'session_closed',
      fragmentCount: 1,
    });
    await expect(controller.submitUtterance('again')).resolves.toBeNull();
    expect(speech.records.filter((record) => record.kind === 'begin')).toHaveLength(1);
  });
});

// ─── Failures ───────────────────────────────────────────────────────────────

describe('failures', () => {
  test('a generator failure before any fragment ends the turn', async () => {
    const generator = new FakeGenerator(async function* () {
      throw new Error('model down');
    });
    const { controller, speech } = setup(generator);

    const outcome = await controller.submitUtterance('hello');

    expect(outcome).toEqual({ turnId: 1, status: 'cancelled', reason: 'generation_failed', fragmentCount: 0 });
    expect(speech.records.map((record) => record.kind)).toEqual(['begin', 'end']);
    expect(controller.history()).toEqual([{ role: 'user', text: 'hello' }]);
  });

  test('a generator failure mid-stream keeps the fragments already sent', async () => {
    const generator = new FakeGenerator(async function* () {
      yield 'partial';
      throw new Error('stream reset');
    });
    const { controller, speech, published } = setup(generator);

    const outcome = await controller.submitUtterance('hello');

    expect(outcome).toEqual({ turnId: 1, status: 'cancelled', reason: 'generation_failed', fragmentCount: 1 });
    expect(speech.spoken(1)).toEqual([[0, 'partial']]);
    expect(controller.history()).toHaveLength(1);
    expect(published.map((message) => message.type)).toEqual(['bot-llm-started', 'bot-llm-text']);
  });

  test('a generator that throws on creation fails the turn', async () => {
    const generator = new FakeGenerator(() => {
      throw new Error('bad config');
    });
    const { controller } = setup(generator);

    const outcome = await controller.submitUtterance('hello');

    expect(outcome?.reason).toBe('generation_failed');
    expect(controller.phase).toBe('idle');
  });

  test('a failed speak call ends the turn as an output failure', async () => {
    const speech = new RecordingSpeechOutput();
    speech.speakImpl = async (fragment) => {
      if (fragment.sequence === 1) {
        throw new Error('socket closed');
      }
    };
    const { controller } = setup(fixedGenerator(['a', 'b', 'c']), { speech });

    const outcome = await controller.submitUtterance('go');

    expect(outcome).toEqual({ turnId: 1, status: 'cancelled', reason: 'output_failed', fragmentCount: 2 });
    expect(speech.records.map((record) => record.kind)).toEqual(['begin', 'speak', 'speak', 'end']);
    expect(controller.history()).toHaveLength(1);
  });

  test('a failed turn start skips generation but still ends the turn', async () => {
    const speech = new RecordingSpeechOutput();
    speech.beginTurn = async () => {
      throw new Error('socket closed');
    };
    const generator = fixedGenerator(['a']);
    const { controller, published } = setup(generator, { speech });

    const outcome = await controller.submitUtterance('go');

    expect(outcome).toEqual({ turnId: 1, status: 'cancelled', reason: 'output_failed', fragmentCount: 0 });
    expect(generator.calls).toHaveLength(0);
    expect(speech.records).toEqual([{ kind: 'end', outcome }]);
    expect(published).toHaveLength(0);
  });

  test('a failing turn end does not fail the turn', async () => {
    const speech = new RecordingSpeechOutput();
    speech.endTurn = async () => {
      throw new Error('socket closed');
    };
    const { controller } = setup(fixedGenerator(['a']), { speech });

    await expect(controller.submitUtterance('go')).resolves.toEqual({
      turnId: 1,
      status: 'complete',
      reason: 'completed',
      fragmentCount: 1,
    });
  });
});

// ─── Overlapping utterances ─────────────────────────────────────────────────

describe('utterance policy', () => {
  test('interrupt: a new utterance supersedes the active turn', async () => {
    const hold = deferred();
    const generator = heldGenerator(hold.promise);
    const { controller, speech } = setup(generator, { utterancePolicy: 'interrupt' });

    const first = controller.submitUtterance('first');
    await tick();
    const second = controller.submitUtterance('second');

    await expect(first).resolves.toEqual({
      turnId: 1,
      status: 'cancelled',
      reason: 'superseded',
      fragmentCount: 1,
    });
    await expect(second).resolves.toEqual({
      turnId: 2,
      status: 'complete',
      reason: 'completed',
      fragmentCount: 2,
    });
    hold.resolve();

    expect(speech.records.map((record) => (record.kind === 'begin' ? `begin:${record.turnId}` : record.kind))).toEqual([
      'begin:1',
      'speak',
      'end',
      'begin:2',
      'speak',
      'speak',
      'end',
    ]);
    expect(generator.calls[1].history).toEqual([{ role: 'user', text: 'first' }]);
    expect(controller.history()).toEqual([
      { role: 'user', text: 'first' },
      { role: 'user', text: 'second' },
      { role: 'assistant', text: 'Second reply' },
    ]);
  });

  test('interrupt: only the latest of several waiting utterances starts a turn', async () => {
    const hold = deferred();
    const generator = heldGenerator(hold.promise);
    const { controller } = setup(generator);

    const first = controller.submitUtterance('first');
    await tick();
    const second = controller.submitUtterance('second');
    const third = controller.submitUtterance('third');

    await expect(first).resolves.toMatchObject({ reason: 'superseded' });
    await expect(second).resolves.toBeNull();
    await expect(third).resolves.toMatchObject({ turnId: 2, status: 'complete' });
    hold.resolve();

    expect(generator.calls.map((call) => call.utterance)).toEqual(['first', 'third']);
  });

  test('drop: utterances during an active turn are discarded', async () => {
    const hold = deferred();
    const generator = heldGenerator(hold.promise);
    const { controller } = setup(generator, { utterancePolicy: 'drop' });

    const first = controller.submitUtterance('first');
    await tick();

    await expect(controller.submitUtterance('second')).resolves.toBeNull();

    hold.resolve();
    await expect(first).resolves.toEqual({
      turnId: 1,
      status: 'complete',
      reason: 'completed',
      fragmentCount: 2,
    });
    expect(generator.calls).toHaveLength(1);
    expect(controller.history()).toEqual([
      { role: 'user', text: 'first' },
      { role: 'assistant', text: 'One more' },
    ]);
  });
});
