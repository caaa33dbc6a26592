import { Mailbox } from '../../client/mailbox';

describe('Mailbox', () => {
  test('take returns a queued item immediately', async () => {
    const mailbox = new Mailbox<string>();
    mailbox.put('a');
    mailbox.put('b');

    await expect(mailbox.take(10)).resolves.toBe('a');
    await expect(mailbox.take(10)).resolves.toBe('b');
  });

  test('a waiting take receives the next put', async () => {
    const mailbox = new Mailbox<number>();
    const taking = mailbox.take(1000);
    mailbox.put(7);

    await expect(taking).resolves.toBe(7);
    expect(mailbox.size).toBe(0);
  });

  test('take resolves undefined after the timeout', async () => {
    const mailbox = new Mailbox<number>();
    await expect(mailbox.take(5)).resolves.toBeUndefined();
  });

  test('interrupt wakes a waiting take with undefined', async () => {
    const mailbox = new Mailbox<number>();
    const taking = mailbox.take(1000);
    mailbox.interrupt();

    await expect(taking).resolves.toBeUndefined();
    mailbox.put(1);
    expect(mailbox.size).toBe(1);
  });

  test('rejects a second concurrent consumer', async () => {
    const mailbox = new Mailbox<number>();
    const first = mailbox.take(1000);

    await expect(mailbox.take(1000)).rejects.toThrow('Mailbox already has a consumer waiting');
    mailbox.interrupt();
    await first;
  });

  test('drain empties the queue', () => {
    const mailbox = new Mailbox<string>();
    mailbox.put('x');
    mailbox.put('y');

    expect(mailbox.drain()).toEqual(['x', 'y']);
    expect(mailbox.size).toBe(0);
  });
});
