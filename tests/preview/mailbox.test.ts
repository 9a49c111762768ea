import { describe, it, expect } from 'vitest';
import { Mailbox } from '../../src/preview/mailbox.js';

describe('Mailbox', () => {
  it('delivers messages in order', async () => {
    const mailbox = new Mailbox<number>();
    mailbox.offer(1);
    mailbox.deliver(2);
    mailbox.offer(3);

    expect(await mailbox.take()).toBe(1);
    expect(await mailbox.take()).toBe(2);
    expect(await mailbox.take()).toBe(3);
  });

  it('hands a message straight to a waiting consumer', async () => {
    const mailbox = new Mailbox<string>();
    const pending = mailbox.take();
    expect(mailbox.offer('key')).toBe(true);
    expect(await pending).toBe('key');
    expect(mailbox.size).toBe(0);
  });

  it('drops offers beyond capacity but never deliveries', () => {
    const mailbox = new Mailbox<number>(2);
    expect(mailbox.offer(1)).toBe(true);
    expect(mailbox.offer(2)).toBe(true);
    expect(mailbox.offer(3)).toBe(false);

    mailbox.deliver(4);
    expect(mailbox.size).toBe(3);
  });

  it('releases waiting consumers on close', async () => {
    const mailbox = new Mailbox<number>();
    const pending = mailbox.take();
    mailbox.close();

    expect(await pending).toBeUndefined();
    expect(mailbox.isClosed).toBe(true);
  });

  it('discards queued and later messages once closed', async () => {
    const mailbox = new Mailbox<number>();
    mailbox.offer(1);
    mailbox.close();

    expect(mailbox.offer(2)).toBe(false);
    mailbox.deliver(3);
    expect(mailbox.size).toBe(0);
    expect(await mailbox.take()).toBeUndefined();
  });
});
