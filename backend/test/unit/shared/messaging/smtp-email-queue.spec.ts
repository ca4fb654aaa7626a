import { describe, it, expect, vi } from 'vitest';
import { TimeoutError } from '../../../../src/shared/async/with-timeout';
import { SmtpEmailQueue } from '../../../../src/shared/messaging/smtp-email-queue';

const sendMail = vi.hoisted(() => vi.fn());

vi.mock('nodemailer', () => ({
  createTransport: () => ({ sendMail, close: () => undefined }),
}));

function makeQueue(timeoutMs = 1000) {
  return new SmtpEmailQueue({
    smtp: { host: 'smtp.test', port: 587, secure: false, user: null, password: null },
    from: 'no-reply@contacts.test',
    appBaseUrl: 'https://app.contacts.test',
    timeoutMs,
  });
}

const MESSAGE = {
  type: 'auth.verify-email',
  principalId: 'principal-1',
  email: 'alice@example.com',
  verifyToken: 'tok-123',
} as const;

describe('SmtpEmailQueue', () => {
  it('sends a verification link built from the app base URL', async () => {
    sendMail.mockResolvedValue({ messageId: 'm-1' });

    await makeQueue().enqueue(MESSAGE);

    expect(sendMail).toHaveBeenCalledTimes(1);
    expect(sendMail).toHaveBeenCalledWith({
      from: 'no-reply@contacts.test',
      to: 'alice@example.com',
      subject: 'Confirm your email address',
      text: 'Confirm your email address by opening this link:\n\nhttps://app.contacts.test/auth/verify-email?token=tok-123\n',
      html: '<p>Confirm your email address by opening <a href="https://app.contacts.test/auth/verify-email?token=tok-123">this link</a>.</p>',
    });
  });

  it('gives up when the relay does not answer in time', async () => {
    sendMail.mockReturnValue(new Promise(() => undefined));

    const err = await makeQueue(20).enqueue(MESSAGE).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TimeoutError);
    expect(err).toMatchObject({ message: 'mail.auth.verify-email timed out after 20ms' });
  });

  it('propagates transport failures', async () => {
    sendMail.mockRejectedValue(new Error('connection refused'));

    await expect(makeQueue().enqueue(MESSAGE)).rejects.toThrow('connection refused');
  });
});
