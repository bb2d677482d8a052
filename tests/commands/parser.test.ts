/**
 * Tests for command parsing
 */

import { describe, it, expect } from 'vitest';
import { parseCommand } from '../../src/commands/parser.js';
import { CommandUsageError } from '../../src/errors.js';

describe('parseCommand', () => {
  it('should ignore text that is not a command', () => {
    expect(parseCommand('I love Python!')).toBeNull();
    expect(parseCommand('')).toBeNull();
  });

  it('should ignore unknown commands', () => {
    expect(parseCommand('/start')).toBeNull();
  });

  it('should parse commands without arguments', () => {
    expect(parseCommand('/keywords')).toEqual({ name: 'keywords', args: {} });
    expect(parseCommand('/status')).toEqual({ name: 'status', args: {} });
  });

  it('should accept any case and a bot mention', () => {
    expect(parseCommand('/HELP')).toEqual({ name: 'help', args: {} });
    expect(parseCommand('/add@monitor_bot Python')).toEqual({
      name: 'add',
      args: { pattern: 'Python' },
    });
  });

  describe('/add', () => {
    it('should keep the whole remainder as pattern', () => {
      expect(parseCommand('/add  (?i)machine learning ')).toEqual({
        name: 'add',
        args: { pattern: '(?i)machine learning' },
      });
    });

    it('should require a keyword', () => {
      expect(() => parseCommand('/add')).toThrow(
        new CommandUsageError('Please provide a keyword.\n\nExample: /add python')
      );
    });
  });

  describe('/remove', () => {
    it('should parse a selector or none', () => {
      expect(parseCommand('/remove 2')).toEqual({ name: 'remove', args: { selector: '2' } });
      expect(parseCommand('/remove telegram')).toEqual({
        name: 'remove',
        args: { selector: 'telegram' },
      });
      expect(parseCommand('/remove')).toEqual({ name: 'remove', args: { selector: null } });
    });
  });

  describe('group lists', () => {
    it('should parse each action', () => {
      expect(parseCommand('/whitelist add Python Developers')).toEqual({
        name: 'whitelist',
        args: { action: { kind: 'add', entry: 'Python Developers' } },
      });
      expect(parseCommand('/blacklist remove 1')).toEqual({
        name: 'blacklist',
        args: { action: { kind: 'remove', selector: '1' } },
      });
      expect(parseCommand('/blacklist LIST')).toEqual({
        name: 'blacklist',
        args: { action: { kind: 'list' } },
      });
      expect(parseCommand('/whitelist clear')).toEqual({
        name: 'whitelist',
        args: { action: { kind: 'clear' } },
      });
    });

    it('should reject a missing or unknown action', () => {
      expect(() => parseCommand('/whitelist')).toThrow(CommandUsageError);
      expect(() => parseCommand('/whitelist drop x')).toThrow(
        'Unknown action: drop\n\nAvailable actions: add, remove, list, clear'
      );
    });

    it('should require a value for add', () => {
      expect(() => parseCommand('/blacklist add')).toThrow(
        'Please provide a group name or chat id.\n\nExample: /blacklist add Python Developers'
      );
    });
  });

  describe('/duplicates', () => {
    it('should parse each action', () => {
      expect(parseCommand('/duplicates')).toEqual({ name: 'duplicates', args: { action: { kind: 'show' } } });
      expect(parseCommand('/duplicates off')).toEqual({
        name: 'duplicates',
        args: { action: { kind: 'enable', enabled: false } },
      });
      expect(parseCommand('/duplicates hours 12')).toEqual({
        name: 'duplicates',
        args: { action: { kind: 'hours', hours: 12 } },
      });
      expect(parseCommand('/duplicates sender OFF')).toEqual({
        name: 'duplicates',
        args: { action: { kind: 'sender', includeSender: false } },
      });
      expect(parseCommand('/duplicates debug status')).toEqual({
        name: 'duplicates',
        args: { action: { kind: 'debugStatus' } },
      });
      expect(parseCommand('/duplicates clear')).toEqual({
        name: 'duplicates',
        args: { action: { kind: 'clearCache' } },
      });
    });

    it('should keep hours within one week', () => {
      expect(() => parseCommand('/duplicates hours 0')).toThrow(
        'Hours must be between 1 and 168 (one week).'
      );
      expect(() => parseCommand('/duplicates hours 169')).toThrow(CommandUsageError);
      expect(() => parseCommand('/duplicates hours soon')).toThrow(CommandUsageError);
    });

    it('should require on or off for sender', () => {
      expect(() => parseCommand('/duplicates sender maybe')).toThrow(
        "Use 'on' or 'off'.\n\nExample: /duplicates sender off"
      );
    });
  });

  describe('/target', () => {
    it('should parse show, test, set and check', () => {
      expect(parseCommand('/target')).toEqual({ name: 'target', args: { action: { kind: 'show' } } });
      expect(parseCommand('/target test')).toEqual({ name: 'target', args: { action: { kind: 'test' } } });
      expect(parseCommand('/target set @alerts_channel')).toEqual({
        name: 'target',
        args: { action: { kind: 'set', target: { kind: 'handle', handle: 'alerts_channel' } } },
      });
      expect(parseCommand('/target check -1001234567890')).toEqual({
        name: 'target',
        args: { action: { kind: 'check', target: { kind: 'chatId', chatId: -1001234567890 } } },
      });
    });

    it('should reject an unrecognized target', () => {
      expect(() => parseCommand('/target set not a target')).toThrow(/^Unrecognized target: not a target/);
    });

    it('should require a value for set', () => {
      expect(() => parseCommand('/target set')).toThrow(
        'Please provide a target.\n\nExample: /target set @my_alerts'
      );
    });
  });
});
