import nodemailer from 'nodemailer';
import {
    MAIL_DEFAULTS,
    UpstreamServiceError,
    type Logger,
    type MailConfig,
    type Notifier
} from '@worksheetbot/core';

export interface MailEnvelope {
    from: string;
    to: string;
    subject: string;
    text: string;
}

/** Structural subset of a nodemailer transporter. */
export interface MailTransporter {
    sendMail(envelope: MailEnvelope): Promise<unknown>;
    close(): void;
}

export interface SmtpNotifierOptions {
    mail: MailConfig;
    subject?: string;
    logger?: Logger;
    transporter?: MailTransporter;
}

export function buildLinkMessage(link: string): string {
    return `Here is the latest worksheet link:\n${link}`;
}

export class SmtpNotifier implements Notifier {
    private readonly transporter: MailTransporter;

    public constructor(private readonly opts: SmtpNotifierOptions) {
        const { mail } = opts;
        this.transporter = opts.transporter ?? nodemailer.createTransport({
            host: mail.host,
            port: mail.port,
            secure: mail.secure,
            ...(mail.user !== undefined && { auth: { user: mail.user, pass: mail.pass } })
        });
    }

    public async notify(link: string): Promise<void> {
        const { mail } = this.opts;
        const envelope: MailEnvelope = {
            from: mail.from,
            to: mail.recipients.join(', '),
            subject: this.opts.subject ?? MAIL_DEFAULTS.SUBJECT,
            text: buildLinkMessage(link)
        };

        try {
            await this.transporter.sendMail(envelope);
        } catch (error) {
            throw UpstreamServiceError.from('mail', error);
        }

        this.opts.logger?.info({ recipients: mail.recipients.length }, 'worksheet link sent');
    }

    public async close(): Promise<void> {
        this.transporter.close();
    }
}
