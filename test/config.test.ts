import { config, resolveConfig } from '../src/config';
import { ConfigError } from '../src/errors';

describe('config', () => {
  it('defaults to the classic layout', () => {
    expect(config.layout).toBe('classic');
  });

  describe('resolveConfig', () => {
    it('returns the defaults without overrides', () => {
      expect(resolveConfig({})).toEqual(config);
    });
    it('returns a fresh object', () => {
      expect(resolveConfig({})).not.toBe(config);
    });
    it('takes the layout from MAZE_LAYOUT, trimmed', () => {
      expect(resolveConfig({ MAZE_LAYOUT: ' spiral ' }).layout).toBe('spiral');
    });
    it('takes the seed from MAZE_SEED', () => {
      expect(resolveConfig({ MAZE_SEED: 'abc' }).seed).toBe('abc');
    });
    it('parses MAZE_WIDTH', () => {
      expect(resolveConfig({ MAZE_WIDTH: '15' }).width).toBe(15);
    });
    it('parses MAZE_HEIGHT', () => {
      expect(resolveConfig({ MAZE_HEIGHT: '9' }).height).toBe(9);
    });
    it('rejects a non-numeric size', () => {
      expect(() => resolveConfig({ MAZE_WIDTH: 'abc' })).toThrow(
        "MAZE_WIDTH must be a positive integer, got 'abc'"
      );
    });
    it('rejects a zero size', () => {
      expect(() => resolveConfig({ MAZE_HEIGHT: '0' })).toThrow(ConfigError);
    });
    it('disables color when NO_COLOR is set', () => {
      expect(resolveConfig({ NO_COLOR: '1' }).color).toBe(false);
    });
    it('keeps color when NO_COLOR is empty', () => {
      expect(resolveConfig({ NO_COLOR: '' }).color).toBe(true);
    });
    it('enables warnings with MAZE_WARNINGS=1', () => {
      expect(resolveConfig({ MAZE_WARNINGS: '1' }).warnings).toBe(true);
    });
    it('ignores other MAZE_WARNINGS values', () => {
      expect(resolveConfig({ MAZE_WARNINGS: 'yes' }).warnings).toBe(false);
    });
    it('leaves the base object untouched', () => {
      const base = { ...config };
      resolveConfig({ MAZE_LAYOUT: 'spiral' }, base);
      expect(base.layout).toBe('classic');
    });
  });
});
