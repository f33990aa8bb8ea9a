import Database from 'better-sqlite3';

import { TurnPipeline } from '../../src/app/conversation/turn-pipeline.js';
import { debug, debugEmitter } from '../../src/debug/index.js';
import type { DebugEvent } from '../../src/debug/index.js';
import { StubLLMGateway } from '../../src/infra/llm/stub-gateway.js';
import { SqliteAttributeRepository } from '../../src/infra/persistence/attribute-repository.js';

describe('debug instrumentation', () => {
  const events: DebugEvent[] = [];
  const collect = (event: DebugEvent): void => {
    events.push(event);
  };

  beforeEach(() => {
    events.length = 0;
    debugEmitter.onDebug(collect);
  });

  afterEach(() => {
    debugEmitter.offDebug(collect);
    debugEmitter.disable();
    debugEmitter.clearContext();
  });

  it('emits nothing while disabled', () => {
    debug.turnStep('response', 'processing');

    expect(events).toEqual([]);
  });

  it('stops delivering to a listener after unsubscribing', () => {
    debugEmitter.enable();
    const seen: string[] = [];
    const unsubscribe = debugEmitter.onDebug(event => {
      seen.push(event.type);
    });

    debug.storeValueInserted(1, 1);
    unsubscribe();
    debug.storeValueInserted(1, 2);

    expect(seen).toEqual(['store.value_inserted']);
    expect(events).toHaveLength(2);
  });

  it('stamps events with the current turn and truncates long text', () => {
    debugEmitter.enable();
    debug.setContext({ turnId: 'turn-1' });

    debug.turnStarted('turn-1', 'x'.repeat(5000), false);

    expect(events).toHaveLength(1);
    expect(events[0].type).toBe('turn.started');
    expect(events[0].source).toBe('turn-pipeline');
    expect(events[0].turnId).toBe('turn-1');
    expect(events[0].data.input).toBe(`${'x'.repeat(4096)} [truncated]`);
  });

  describe('during a turn', () => {
    let db: Database.Database;
    let store: SqliteAttributeRepository;

    beforeEach(() => {
      db = new Database(':memory:');
      store = new SqliteAttributeRepository(db);
      store.initialize();
      store.createDefinition({ name: 'Profile', extractionPrompt: 'Extract it', judgmentPrompt: 'Needed?' });
      debugEmitter.enable();
    });

    afterEach(() => {
      db.close();
    });

    it('reports the turn lifecycle under one turn id', async () => {
      const gateway = new StubLLMGateway().setJudgment('Profile', false).setExtraction('Profile', 'engineer');
      const pipeline = new TurnPipeline({ store, gateway });

      await pipeline.process('I am an engineer');

      const turnEvents = events.filter(event => event.type.startsWith('turn.'));
      expect(turnEvents.map(event => event.type)).toEqual([
        'turn.started',
        'turn.step',
        'turn.step',
        'turn.step',
        'turn.step',
        'turn.step',
        'turn.step',
        'turn.step',
        'turn.completed',
      ]);
      expect(events.map(event => event.type)).toEqual(
        expect.arrayContaining(['llm.request', 'llm.response', 'store.value_inserted'])
      );

      const turnId = turnEvents[0].data.turnId;
      expect(typeof turnId).toBe('string');
      expect(events.every(event => event.turnId === turnId)).toBe(true);
      expect(turnEvents[8].data.extractedAttributes).toEqual(['Profile']);
      expect(debug.getContext()).toEqual({});
    });

    it('reports the stage a turn failed in', async () => {
      const pipeline = new TurnPipeline({
        store,
        gateway: {
          getName: () => 'failing',
          generate: async () => {
            throw new Error('offline');
          },
        },
      });

      await expect(pipeline.process('hello')).rejects.toThrow('offline');

      const failed = events.find(event => event.type === 'turn.failed');
      expect(failed?.data.stage).toBe('judgment');
      expect(failed?.data.error).toEqual(expect.objectContaining({ name: 'Error', message: 'offline' }));
    });
  });
});
