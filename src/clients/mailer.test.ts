/**
 * Unit tests for SMTP delivery
 */

import { describe, it, expect, vi } from 'vitest';
import type { SendMailOptions } from 'nodemailer';
import { SmtpMailer, type MailTransport } from './mailer.js';
import { DeliveryError } from '../errors.js';
import type { EmailConfig } from '../config.js';

const emailConfig: EmailConfig = {
    enabled: true,
    recipient: 'reader@example.com',
    from: 'sender@example.com',
    smtp: { host: 'smtp.example.com', port: 587, secure: false, username: 'sender@example.com', password: 'test-password' },
};

function fakeTransport(impl: (mail: SendMailOptions) => Promise<{ messageId: string }>) {
    const sendMail = vi.fn(impl);
    const transport: MailTransport = { sendMail };
    return { transport, sendMail };
}

describe('SmtpMailer', () => {
    it('should send text and HTML from the configured sender', async () => {
        const { transport, sendMail } = fakeTransport(async () => ({ messageId: '<1@example.com>' }));
        const mailer = new SmtpMailer(emailConfig, transport);

        const result = await mailer.send({
            to: 'reader@example.com',
            subject: 'Research Summary: test topic',
            text: '## Summary',
            html: '<h2>Summary</h2>',
        });

        expect(result).toEqual({ messageId: '<1@example.com>' });
        expect(sendMail).toHaveBeenCalledWith({
            from: 'sender@example.com',
            to: 'reader@example.com',
            subject: 'Research Summary: test topic',
            text: '## Summary',
            html: '<h2>Summary</h2>',
            textEncoding: 'base64',
        });
    });

    it('should wrap transport failures in DeliveryError', async () => {
        const { transport } = fakeTransport(async () => {
            throw new Error('Greeting never received');
        });
        const mailer = new SmtpMailer(emailConfig, transport);

        const error = await mailer.send({ to: 'reader@example.com', subject: 's', text: 't' }).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(DeliveryError);
        expect(error).toHaveProperty('message', 'Failed to deliver report to reader@example.com: Greeting never received');
        expect(error).toHaveProperty('recipient', 'reader@example.com');
    });
});
