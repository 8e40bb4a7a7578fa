// pattern: Imperative Shell
import nodemailer from "nodemailer";
import type { Logger } from "pino";
import type { DeliveryConfig, SmtpConfig } from "../config";

/**
 * Discriminated union result type for digest email send operations.
 */
export type SendResult =
  | { readonly success: true; readonly messageId: string }
  | { readonly success: false; readonly error: string };

/**
 * Function signature for sending a digest email via a mail provider.
 * Never throws: errors are returned in the result.
 */
export type SendDigestFn = (
  recipient: string,
  subject: string,
  html: string,
  logger: Logger,
) => Promise<SendResult>;

/**
 * Creates an SMTP sender. Each call opens its own session: connect, upgrade
 * with STARTTLS (implicit TLS on port 465), authenticate, send one message,
 * and close the transport whether or not the send succeeded.
 *
 * @param smtp - Relay host, port and credentials
 * @param from - Envelope and header sender address
 */
export function createSmtpSender(smtp: SmtpConfig, from: string): SendDigestFn {
  return async function sendDigest(
    recipient: string,
    subject: string,
    html: string,
    logger: Logger,
  ): Promise<SendResult> {
    const implicitTls = smtp.port === 465;
    const transporter = nodemailer.createTransport({
      host: smtp.host,
      port: smtp.port,
      secure: implicitTls,
      requireTLS: !implicitTls,
      auth: {
        user: smtp.user ?? from,
        pass: smtp.password ?? "",
      },
    });

    try {
      const info = await transporter.sendMail({
        from,
        to: recipient,
        subject,
        html,
        date: new Date(),
      });

      logger.info(
        { messageId: info.messageId, recipient, host: smtp.host },
        "digest email sent",
      );
      return { success: true, messageId: info.messageId };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error(
        { recipient, host: smtp.host, port: smtp.port, error: message },
        "digest email send failed",
      );
      return { success: false, error: message };
    } finally {
      transporter.close();
    }
  };
}

/**
 * Builds the SMTP sender from the delivery settings. Returns null, with the
 * reason logged, when the from-address or the recipient is missing.
 */
export function createDigestSender(
  delivery: DeliveryConfig,
  logger: Logger,
): SendDigestFn | null {
  if (delivery.from === null) {
    logger.error("EMAIL_FROM not set, cannot send digest");
    return null;
  }

  if (delivery.to === null) {
    logger.error("EMAIL_TO not set, cannot send digest");
    return null;
  }

  return createSmtpSender(delivery.smtp, delivery.from);
}
