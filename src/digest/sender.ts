// pattern: Imperative Shell
import { createTransport } from "nodemailer";
import type Mail from "nodemailer/lib/mailer";
import type SMTPTransport from "nodemailer/lib/smtp-transport";
import type { Logger } from "pino";
import type { MailCredentials } from "../config";
import { missingMailFields } from "../config/secrets";
import type { FormattedBody } from "./renderer";
import { resolveSmtpHost } from "./smtp-hosts";

/**
 * The fully addressed message, built right before submission.
 */
export type DeliveryMessage = Readonly<{
  subject: string;
  plainTextBody: string;
  htmlBody?: string;
  sender: string;
  recipient: string;
}>;

export type DeliverError =
  | {
      readonly kind: "MissingConfig";
      readonly missing: ReadonlyArray<keyof MailCredentials>;
    }
  | { readonly kind: "DeliverError"; readonly message: string };

export type DeliverResult =
  | { readonly success: true; readonly messageId: string }
  | { readonly success: false; readonly error: DeliverError };

/**
 * Function signature for delivering a formatted briefing.
 * Never throws; failures come back in the result.
 */
export type DeliverFn = (
  subject: string,
  body: FormattedBody,
  credentials: MailCredentials,
  logger: Logger,
) => Promise<DeliverResult>;

export type MailTransport = {
  sendMail(message: Mail.Options): Promise<{ messageId: string }>;
  close(): void;
};

export type TransportFactory = (
  options: SMTPTransport.Options,
) => MailTransport;

const defaultTransportFactory: TransportFactory = (options) =>
  createTransport(options);

export function toMailOptions(message: DeliveryMessage): Mail.Options {
  return {
    from: message.sender,
    to: message.recipient,
    subject: message.subject,
    text: message.plainTextBody,
    ...(message.htmlBody !== undefined ? { html: message.htmlBody } : {}),
  };
}

/**
 * Creates an SMTP deliverer. Each call opens one implicit-TLS connection to
 * the host matched from the sender's domain, authenticates, sends one
 * message and closes the transport whether or not the send succeeded.
 *
 * @param transportFactory - Builds the nodemailer transport; replaced in tests
 */
export function createSmtpSender(
  transportFactory: TransportFactory = defaultTransportFactory,
): DeliverFn {
  return async function deliver(
    subject: string,
    body: FormattedBody,
    credentials: MailCredentials,
    logger: Logger,
  ): Promise<DeliverResult> {
    const { sender, password, recipient } = credentials;
    if (!sender?.trim() || !password?.trim() || !recipient?.trim()) {
      const missing = missingMailFields(credentials);
      logger.error({ missing }, "mail configuration incomplete, not sending");
      return { success: false, error: { kind: "MissingConfig", missing } };
    }

    const mail: DeliveryMessage = {
      subject,
      plainTextBody: body.plainTextBody,
      htmlBody: body.htmlBody,
      sender,
      recipient,
    };
    const { host, port, secure } = resolveSmtpHost(sender);

    let transport: MailTransport | null = null;
    try {
      transport = transportFactory({
        host,
        port,
        secure,
        auth: { user: sender, pass: password },
      });

      const info = await transport.sendMail(toMailOptions(mail));
      logger.info(
        { messageId: info.messageId, recipient, host },
        "briefing email sent",
      );
      return { success: true, messageId: info.messageId };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error(
        { recipient, host, error: message },
        "briefing email send failed",
      );
      return { success: false, error: { kind: "DeliverError", message } };
    } finally {
      transport?.close();
    }
  };
}
