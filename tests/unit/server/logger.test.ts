import {
  addGameContext,
  createLogger,
  getGameContext,
  runWithGameContext,
  serializeErrors,
} from '../../../src/server/utils/logger';
import { EngineErrorCode, IllegalMoveError } from '../../../src/shared/engine';

describe('logger', () => {
  describe('game context', () => {
    it('should expose the context only inside runWithGameContext', () => {
      expect(getGameContext()).toBeUndefined();

      const seen = runWithGameContext({ gameId: 'game-1' }, () => getGameContext());

      expect(seen).toEqual({ gameId: 'game-1' });
      expect(getGameContext()).toBeUndefined();
    });

    it('should keep the context across async continuations', async () => {
      const seen = await runWithGameContext({ gameId: 'game-2', playerId: 'p1' }, async () => {
        await Promise.resolve();
        return getGameContext();
      });

      expect(seen).toEqual({ gameId: 'game-2', playerId: 'p1' });
    });

    it('should copy context fields onto log entries', () => {
      const format = addGameContext();

      const inside = runWithGameContext({ gameId: 'game-3', requestId: 'req-1' }, () =>
        format.transform({ level: 'info', message: 'Move accepted' })
      );
      const outside = format.transform({ level: 'info', message: 'Move accepted' });

      expect(inside).toEqual({
        level: 'info',
        message: 'Move accepted',
        gameId: 'game-3',
        requestId: 'req-1',
      });
      expect(outside).toEqual({ level: 'info', message: 'Move accepted' });
    });
  });

  describe('serializeErrors', () => {
    it('should serialize engine errors through toJSON', () => {
      const error = new IllegalMoveError(
        EngineErrorCode.RULES_ILLEGAL_MOVE,
        'Illegal move: e2e5',
        { move: 'e2e5' },
        'MoveValidator'
      );

      const info = serializeErrors().transform({ level: 'warn', message: 'Move rejected', error });

      expect(info).toMatchObject({
        error: {
          type: 'IllegalMoveError',
          code: 'RULES_ILLEGAL_MOVE',
          domain: 'MoveValidator',
          context: { move: 'e2e5' },
        },
      });
    });

    it('should flatten plain errors', () => {
      const info = serializeErrors().transform({
        level: 'error',
        message: 'failed',
        error: new TypeError('bad value'),
      });

      expect(info).toMatchObject({ error: { name: 'TypeError', message: 'bad value' } });
    });
  });

  describe('createLogger', () => {
    it('should use the configured level and tag entries with the service', () => {
      const logger = createLogger({
        nodeEnv: 'test',
        logging: { level: 'warn', format: 'json' },
        serviceName: 'rules-test',
      });

      expect(logger.level).toBe('warn');
      expect(logger.transports).toHaveLength(1);
      expect(logger.defaultMeta).toEqual({ service: 'rules-test', environment: 'test' });
    });
  });
});
