/**
 * Tests for NotificationDispatcher
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CHECK_MESSAGE, NotificationDispatcher } from '../../src/notification/NotificationDispatcher.js';
import { ConfigStore } from '../../src/store/ConfigStore.js';
import { DispatchError } from '../../src/errors.js';
import type { NotificationTarget } from '../../src/types.js';
import { createFakeTransport, makeConfig, makeMessage, type FakeTransport } from '../helpers.js';

const EXPECTED_TEXT = [
  'Keywords: python',
  'Group: Python Jobs',
  'Sender: Ann Lee (@ann)',
  'Time: 2024-05-01 09:30:00',
  'Message: I love Python!',
  'Link: https://t.me/c/1234567890/42',
].join('\n');

describe('NotificationDispatcher', () => {
  let transport: FakeTransport;
  let store: ConfigStore;
  let dispatcher: NotificationDispatcher;

  function setTarget(target: NotificationTarget): void {
    store.mutate((draft) => {
      draft.notificationTarget = target;
    });
  }

  beforeEach(() => {
    transport = createFakeTransport();
    store = new ConfigStore(makeConfig({ keywords: ['python'] }));
    dispatcher = new NotificationDispatcher(transport, store, () => Date.UTC(2024, 0, 1));
  });

  describe('send', () => {
    it('should deliver the formatted payload to self', async () => {
      const result = await dispatcher.send(['python'], makeMessage());

      expect(result).toEqual({ ok: true, target: 'self' });
      expect(transport.sendMessage).toHaveBeenCalledWith('self', EXPECTED_TEXT);
    });

    it('should send to a numeric chat id without lookup', async () => {
      setTarget({ kind: 'chatId', chatId: -1001112223334 });

      await dispatcher.send(['python'], makeMessage());

      expect(transport.sendMessage).toHaveBeenCalledWith(-1001112223334, EXPECTED_TEXT);
      expect(transport.resolveTarget).not.toHaveBeenCalled();
    });

    it('should resolve a handle once and reuse it', async () => {
      setTarget({ kind: 'handle', handle: 'alerts_channel' });

      await dispatcher.send(['python'], makeMessage());
      await dispatcher.send(['python'], makeMessage({ messageId: 43 }));

      expect(transport.resolveTarget).toHaveBeenCalledTimes(1);
      expect(transport.resolveTarget).toHaveBeenCalledWith('alerts_channel');
      expect(transport.sendMessage).toHaveBeenCalledTimes(2);
      expect(transport.sendMessage.mock.calls[1][0]).toBe(-100555);
    });

    it('should share one join between concurrent sends to an invite link', async () => {
      setTarget({ kind: 'invite', link: 'https://t.me/+AbCdEf123' });

      const results = await Promise.all([
        dispatcher.send(['python'], makeMessage({ messageId: 1 })),
        dispatcher.send(['python'], makeMessage({ messageId: 2 })),
      ]);

      expect(transport.joinChannel).toHaveBeenCalledTimes(1);
      expect(results).toEqual([
        { ok: true, target: -100666 },
        { ok: true, target: -100666 },
      ]);
    });

    it('should forward media ahead of the text', async () => {
      const message = makeMessage({ media: { kind: 'photo' } });

      await dispatcher.send(['python'], message);

      expect(transport.forwardMessage).toHaveBeenCalledWith('self', -1001234567890, 42);
      expect(transport.forwardMessage.mock.invocationCallOrder[0]).toBeLessThan(
        transport.sendMessage.mock.invocationCallOrder[0]
      );
    });

    it('should not forward media when forwarding is off', async () => {
      store.mutate((draft) => {
        draft.settings.forwardMedia = false;
      });

      await dispatcher.send(['python'], makeMessage({ media: { kind: 'video' } }));

      expect(transport.forwardMessage).not.toHaveBeenCalled();
      expect(transport.sendMessage).toHaveBeenCalledTimes(1);
    });

    it('should use the plan it is given instead of the live config', async () => {
      const plan = NotificationDispatcher.planFrom(store.snapshot());
      setTarget({ kind: 'chatId', chatId: 5 });

      await dispatcher.send(['python'], makeMessage(), plan);

      expect(transport.sendMessage).toHaveBeenCalledWith('self', EXPECTED_TEXT);
    });

    it('should report an unresolvable handle', async () => {
      setTarget({ kind: 'handle', handle: 'missing_channel' });
      transport.resolveTarget.mockRejectedValueOnce(new Error('chat not found'));

      const result = await dispatcher.send(['python'], makeMessage());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.reason).toBe('unresolved');
        expect(result.error.message).toBe('Cannot reach channel @missing_channel: chat not found');
      }
      expect(transport.sendMessage).not.toHaveBeenCalled();
    });

    it('should report a failed join', async () => {
      setTarget({ kind: 'invite', link: 'https://t.me/+AbCdEf123' });
      transport.joinChannel.mockRejectedValueOnce(new DispatchError('join', 'cannot join'));

      const result = await dispatcher.send(['python'], makeMessage());

      expect(result).toEqual({ ok: false, error: expect.any(DispatchError) });
      if (!result.ok) {
        expect(result.error.reason).toBe('join');
      }
    });

    it('should keep the reason of a transport DispatchError', async () => {
      transport.sendMessage.mockRejectedValueOnce(new DispatchError('permission', 'denied'));

      const result = await dispatcher.send(['python'], makeMessage());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.reason).toBe('permission');
      }
    });

    it('should wrap other errors as send failures', async () => {
      transport.sendMessage.mockRejectedValueOnce(new Error('socket hang up'));
      const failed = vi.fn();
      dispatcher.on('failed', failed);

      const result = await dispatcher.send(['python'], makeMessage());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.reason).toBe('send');
        expect(result.error.message).toBe('socket hang up');
      }
      expect(failed).toHaveBeenCalledTimes(1);
    });

    it('should resolve again after a failed send', async () => {
      setTarget({ kind: 'handle', handle: 'alerts_channel' });
      transport.sendMessage.mockRejectedValueOnce(new DispatchError('permission', 'kicked'));

      await dispatcher.send(['python'], makeMessage());
      await dispatcher.send(['python'], makeMessage());

      expect(transport.resolveTarget).toHaveBeenCalledTimes(2);
    });

    it('should never retry', async () => {
      transport.sendMessage.mockRejectedValue(new Error('down'));

      await dispatcher.send(['python'], makeMessage());

      expect(transport.sendMessage).toHaveBeenCalledTimes(1);
    });

    it('should emit sent on success', async () => {
      const sent = vi.fn();
      dispatcher.on('sent', sent);
      const message = makeMessage();

      await dispatcher.send(['python'], message);

      expect(sent).toHaveBeenCalledWith(['python'], message, 'self');
    });
  });

  describe('sendTest', () => {
    it('should send a synthetic notification to the current target', async () => {
      setTarget({ kind: 'chatId', chatId: 321 });

      const result = await dispatcher.sendTest();

      expect(result).toEqual({ ok: true, target: 321 });
      expect(transport.sendMessage).toHaveBeenCalledWith(
        321,
        [
          'Keywords: test',
          'Group: Keyword Monitor',
          'Sender: Keyword Monitor',
          'Time: 2024-01-01 00:00:00',
          'Message: This is a test notification.',
          'Link: https://t.me/c/0/0',
        ].join('\n')
      );
    });
  });

  describe('check', () => {
    it('should probe a target without changing the config', async () => {
      const before = store.snapshot();

      const result = await dispatcher.check({ kind: 'handle', handle: 'other_channel' });

      expect(result).toEqual({ ok: true, target: -100555 });
      expect(transport.sendMessage).toHaveBeenCalledWith(-100555, CHECK_MESSAGE);
      expect(store.snapshot()).toBe(before);
    });

    it('should report a failed probe', async () => {
      transport.sendMessage.mockRejectedValueOnce(new DispatchError('permission', 'denied'));

      const result = await dispatcher.check({ kind: 'chatId', chatId: 9 });

      expect(result.ok).toBe(false);
    });
  });
});
