import { describe, it, expect } from '@jest/globals';
import { createEngineLogger } from '../engine-logger';

describe('createEngineLogger', () => {
  it('forwards messages to the sink', () => {
    const messages: string[] = [];
    const logger = createEngineLogger({ onLog: m => messages.push(m), verbosity: 'normal' });

    logger.log('[Affine] hello');
    logger.logDebug('[Affine] hidden');

    expect(messages).toEqual(['[Affine] hello']);
  });

  it('emits debug messages in verbose mode', () => {
    const messages: string[] = [];
    const logger = createEngineLogger({ onLog: m => messages.push(m), verbosity: 'verbose' });

    logger.logDebug('[Consensus] detail');

    expect(messages).toEqual(['[Consensus] detail']);
  });

  it('does not share messages between loggers', () => {
    const first: string[] = [];
    const second: string[] = [];
    const a = createEngineLogger({ onLog: m => first.push(m) });
    const b = createEngineLogger({ onLog: m => second.push(m) });

    a.log('a');
    b.log('b');

    expect(first).toEqual(['a']);
    expect(second).toEqual(['b']);
  });
});
