import { Inject, Injectable, Logger } from '@nestjs/common';
import { createTransport, Transporter } from 'nodemailer';
import { DIGEST_CONFIG, DigestConfig } from '../config/digest.config';
import { ConfigError, DeliveryError } from '../errors/digest.errors';
import { DigestFormatterService } from './digest-formatter.service';

export interface OutgoingDigest {
  subject: string;
  body: string;
  mobileTldr?: string | null;
}

@Injectable()
export class DigestMailerService {
  private readonly logger = new Logger(DigestMailerService.name);
  private transporter: Transporter | null = null;

  constructor(
    @Inject(DIGEST_CONFIG) private readonly config: DigestConfig,
    private readonly formatter: DigestFormatterService,
  ) {}

  async send(digest: OutgoingDigest): Promise<string> {
    const { from, to, pass } = this.config.mail;
    if (!from || !to || !pass) {
      throw new ConfigError(
        'FROM_EMAIL, TO_EMAIL and SMTP_PASS (or GMAIL_APP_PASSWORD) are required to send',
      );
    }

    try {
      const info: { messageId?: string } =
        await this.getTransporter().sendMail({
          from,
          to,
          subject: digest.subject,
          text: this.formatter.toPlainText(digest.body, digest.mobileTldr),
          html: this.formatter.toHtml(digest.body, digest.mobileTldr),
        });
      const messageId = info.messageId ?? '';
      this.logger.log(`mail sent: to=${to} messageId=${messageId}`);
      return messageId;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new DeliveryError(`mail delivery failed: ${message}`, {
        host: this.config.mail.host,
      });
    }
  }

  private getTransporter(): Transporter {
    if (!this.transporter) {
      const { host, port, user, pass } = this.config.mail;
      this.transporter = createTransport({
        host,
        port,
        secure: port === 465,
        auth: { user, pass },
      });
    }
    return this.transporter;
  }
}
