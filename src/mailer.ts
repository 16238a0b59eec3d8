import nodemailer, { Transporter } from 'nodemailer';
import SMTPTransport from 'nodemailer/lib/smtp-transport';
import { SmtpConfig } from './config';
import { errorMessage, safeLogger } from './security/safeLogger';

export function createMailTransport(smtp: SmtpConfig): Transporter<SMTPTransport.SentMessageInfo> {
  return nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    // 465 is implicit TLS; 587 and 25 upgrade with STARTTLS
    secure: smtp.port === 465,
    auth: smtp.user ? { user: smtp.user, pass: smtp.pass } : undefined,
    connectionTimeout: 30_000,
    greetingTimeout: 30_000,
    socketTimeout: 30_000,
  });
}

/** Startup check only; a failure is logged and email stays enabled. */
export async function verifyMailTransport(transport: { verify(): Promise<unknown> }, smtp: SmtpConfig): Promise<boolean> {
  try {
    await transport.verify();
    safeLogger.info('mail.transport.ready', { host: smtp.host, port: smtp.port });
    return true;
  } catch (err) {
    safeLogger.error('mail.transport.unreachable', { host: smtp.host, port: smtp.port, reason: errorMessage(err) });
    return false;
  }
}
