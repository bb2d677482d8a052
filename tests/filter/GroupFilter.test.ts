/**
 * Tests for GroupFilter
 */

import { describe, it, expect } from 'vitest';
import { GroupFilter } from '../../src/filter/GroupFilter.js';
import { ConfigStore } from '../../src/store/ConfigStore.js';
import { makeConfig } from '../helpers.js';

const pythonJobs = { chatId: -1001234567890, chatTitle: 'Python Jobs' };
const rustChat = { chatId: -1009876543210, chatTitle: 'Rust Lang' };

function filterWith(whitelist: string[], blacklist: string[]): GroupFilter {
  return new GroupFilter(new ConfigStore(makeConfig({ groups: { whitelist, blacklist } })));
}

describe('GroupFilter', () => {
  it('should allow every chat when both lists are empty', () => {
    const filter = filterWith([], []);

    expect(filter.allow(pythonJobs)).toBe(true);
    expect(filter.allow(rustChat)).toBe(true);
  });

  it('should allow only whitelisted chats when the whitelist is set', () => {
    const filter = filterWith(['python jobs'], []);

    expect(filter.allow(pythonJobs)).toBe(true);
    expect(filter.allow(rustChat)).toBe(false);
  });

  it('should match whitelist entries by numeric id', () => {
    const filter = filterWith(['-1009876543210'], []);

    expect(filter.allow(rustChat)).toBe(true);
    expect(filter.allow(pythonJobs)).toBe(false);
  });

  it('should reject blacklisted chats by name or id', () => {
    const byName = filterWith([], ['RUST LANG']);
    const byId = filterWith([], ['-1009876543210']);

    expect(byName.allow(rustChat)).toBe(false);
    expect(byId.allow(rustChat)).toBe(false);
    expect(byName.allow(pythonJobs)).toBe(true);
  });

  it('should reject a chat present in both lists', () => {
    const filter = filterWith(['Python Jobs', 'Rust Lang'], ['-1001234567890']);

    expect(filter.allow(pythonJobs)).toBe(false);
    expect(filter.allow(rustChat)).toBe(true);
  });

  it('should not match names partially', () => {
    const filter = filterWith(['Python'], []);

    expect(filter.allow(pythonJobs)).toBe(false);
  });
});
