import { describe, it, expect } from 'vitest';
import { createBuiltinTools, formatWallClock, registerBuiltinTools, type LocalFunctionBinder } from './builtin-tools.js';
import { ToolManager } from './tool-manager.js';
import type { LocalToolFunction } from '../agent/tool-router.js';
import { createTestLogger } from '../../test/support/test-logger.js';

const fixedNow = () => new Date('2024-03-01T12:34:56Z');

function builtin(name: string): LocalToolFunction {
  const tool = createBuiltinTools({ now: fixedNow }).find((candidate) => candidate.definition.name === name);
  if (!tool) throw new Error(`no builtin ${name}`);
  return tool.fn;
}

describe('builtin tools', () => {
  it('should greet by name', () => {
    expect(builtin('greeting')({ name: 'Ada' })).toBe('Hello, Ada');
  });

  it('should tell the time in UTC by default', () => {
    expect(builtin('current_time')({})).toBe('Current time in UTC: 2024-03-01 12:34:56');
  });

  it('should tell the time in a named timezone', () => {
    expect(builtin('current_time')({ timezone: 'Asia/Tokyo' })).toBe('Current time in Asia/Tokyo: 2024-03-01 21:34:56');
  });

  it('should throw for an unknown timezone', () => {
    expect(() => formatWallClock(fixedNow(), 'Mars/Olympus_Mons')).toThrow(RangeError);
  });

  it('should register discoverable tools and bind their functions', async () => {
    const manager = new ToolManager({}, createTestLogger());
    const bound: string[] = [];
    const binder: LocalFunctionBinder = {
      addLocalFunction: (name) => {
        bound.push(name);
      },
    };

    const names = await registerBuiltinTools(manager, binder);

    expect(names).toEqual(['greeting', 'current_time']);
    expect(bound).toEqual(['greeting', 'current_time']);
    expect(manager.has('greeting')).toBe(true);
    expect(manager.getActiveTools()).toEqual([]);
    expect((await manager.search('say hello to Ada')).map((match) => match.name)).toEqual(['greeting']);
  });
});
