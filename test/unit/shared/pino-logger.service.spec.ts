import { describe, it, expect } from 'vitest';
import { createTestLogger, LOG_LEVELS } from '../helpers/mock-factories';

describe('PinoLoggerService', () => {
  it('should write messages with structured bindings', () => {
    const { logger, entries } = createTestLogger();

    logger.warn({ assetId: 'a1', attempt: 2 }, 'Retrying');

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ level: LOG_LEVELS.warn, msg: 'Retrying', assetId: 'a1', attempt: 2 });
  });

  it('should bind context to children without touching the parent', () => {
    const { logger, entries } = createTestLogger();

    logger.forContext('ProcessAssetUseCase').withAssetId('a1').info('Processing');
    logger.info('Unbound');

    expect(entries[0]).toMatchObject({ context: 'ProcessAssetUseCase', assetId: 'a1', msg: 'Processing' });
    expect(entries[1].context).toBeUndefined();
    expect(entries[1].assetId).toBeUndefined();
  });

  it('should accept messages from the framework', () => {
    const { logger, entries } = createTestLogger();

    logger.log('Nest application successfully started', 'NestApplication');
    logger.verbose('not written at debug level');

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: LOG_LEVELS.info,
      msg: 'Nest application successfully started',
      context: 'NestApplication',
    });
  });

  it('should honour the level of the root logger', () => {
    const { logger, messages } = createTestLogger();

    logger.debug('visible');
    logger.error({ runId: 'run-1' }, 'failed');

    expect(messages()).toEqual(['visible', 'failed']);
    expect(messages(LOG_LEVELS.error)).toEqual(['failed']);
  });
});
