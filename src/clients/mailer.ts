/**
 * SMTP delivery of the final report
 */

import nodemailer from 'nodemailer';
import type { SendMailOptions } from 'nodemailer';
import type { EmailConfig } from '../config.js';
import { DeliveryError, errorMessage } from '../errors.js';

export interface MailMessage {
    to: string;
    subject: string;
    text: string;
    html?: string;
}

export interface Mailer {
    send(message: MailMessage): Promise<{ messageId: string }>;
}

/**
 * The part of a nodemailer transport the mailer uses.
 */
export interface MailTransport {
    sendMail(mail: SendMailOptions): Promise<{ messageId: string }>;
}

export function createSmtpTransport(config: EmailConfig): MailTransport {
    const { smtp } = config;
    return nodemailer.createTransport({
        host: smtp.host,
        port: smtp.port,
        secure: smtp.secure,
        // Port 587 and friends: plain connect, then STARTTLS is mandatory
        requireTLS: !smtp.secure,
        auth: smtp.username && smtp.password
            ? { user: smtp.username, pass: smtp.password }
            : undefined,
    });
}

export class SmtpMailer implements Mailer {
    private config: EmailConfig;
    private transport: MailTransport;

    constructor(config: EmailConfig, transport?: MailTransport) {
        this.config = config;
        this.transport = transport ?? createSmtpTransport(config);
    }

    async send(message: MailMessage): Promise<{ messageId: string }> {
        try {
            const info = await this.transport.sendMail({
                from: this.config.from,
                to: message.to,
                subject: message.subject,
                text: message.text,
                html: message.html,
                textEncoding: 'base64',
            });
            return { messageId: info.messageId };
        } catch (error) {
            throw new DeliveryError(message.to, errorMessage(error), { cause: error });
        }
    }
}
