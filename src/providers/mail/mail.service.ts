import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { createTransport, Transporter } from 'nodemailer';
import { MailChannel } from '../../common/config/pipeline.config';
import { NotificationError, errorMessage } from '../../common/errors/pipeline.errors';

/**
 * SMTP 发信
 * 按通道缓存 transporter，587 端口走 STARTTLS，465 端口直接 TLS
 */
@Injectable()
export class MailService implements OnModuleDestroy {
  private readonly logger = new Logger(MailService.name);
  private readonly transporters = new Map<string, Transporter>();

  async send(channel: MailChannel, recipients: readonly string[], subject: string, body: string): Promise<void> {
    try {
      await this.transporterFor(channel).sendMail({
        from: channel.from,
        to: recipients.join(', '),
        subject,
        text: body,
      });
    } catch (err) {
      throw new NotificationError(
        `Failed to send "${subject}" to ${recipients.join(', ')} via ${channel.host}:${channel.port}: ${errorMessage(err)}`,
        { cause: err },
      );
    }
    this.logger.log(`Sent "${subject}" to ${recipients.length} recipient(s)`);
  }

  onModuleDestroy() {
    for (const transporter of this.transporters.values()) {
      transporter.close();
    }
    this.transporters.clear();
  }

  private transporterFor(channel: MailChannel): Transporter {
    const key = `${channel.username}@${channel.host}:${channel.port}`;
    let transporter = this.transporters.get(key);
    if (!transporter) {
      transporter = createTransport({
        host: channel.host,
        port: channel.port,
        secure: channel.port === 465,
        auth: {
          user: channel.username,
          pass: channel.password,
        },
      });
      this.transporters.set(key, transporter);
    }
    return transporter;
  }
}
