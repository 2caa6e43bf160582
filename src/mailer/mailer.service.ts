import { randomUUID } from 'crypto';
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  SESClient,
  SendEmailCommand,
  SendRawEmailCommand,
} from '@aws-sdk/client-ses';
import { buildRawMessage, MailAttachment } from './mime';

export type MailPayload = {
  to: string;
  subject: string;
  text: string;
  html?: string;
  attachments?: MailAttachment[];
};

export type MailResult =
  | { skipped: true; reason: string }
  | { skipped: false; messageId?: string };

@Injectable()
export class MailerService {
  private sesClient: SESClient | null = null;
  private fromAddress: string | null = null;

  constructor(private readonly configService: ConfigService) {
    const region = this.configService.get<string>('ses.region');
    const accessKeyId = this.configService.get<string>('ses.accessKeyId');
    const secretAccessKey = this.configService.get<string>('ses.secretAccessKey');
    const from = this.configService.get<string>('ses.from');

    if (region && accessKeyId && secretAccessKey && from) {
      this.sesClient = new SESClient({
        region,
        credentials: { accessKeyId, secretAccessKey },
      });
      this.fromAddress = from;
    }
  }

  async sendEmail(payload: MailPayload): Promise<MailResult> {
    if (!this.sesClient || !this.fromAddress) {
      return { skipped: true, reason: 'E-mail delivery is not configured.' };
    }

    // Attachments need a raw MIME message; plain mail keeps SendEmail.
    const response = payload.attachments?.length
      ? await this.sesClient.send(
          new SendRawEmailCommand({
            RawMessage: {
              Data: buildRawMessage({
                from: this.fromAddress,
                to: payload.to,
                subject: payload.subject,
                text: payload.text,
                html: payload.html,
                attachments: payload.attachments,
                boundary: randomUUID(),
              }),
            },
          }),
        )
      : await this.sesClient.send(
          new SendEmailCommand({
            Source: this.fromAddress,
            Destination: { ToAddresses: [payload.to] },
            Message: {
              Subject: { Data: payload.subject, Charset: 'UTF-8' },
              Body: {
                Text: { Data: payload.text, Charset: 'UTF-8' },
                ...(payload.html
                  ? { Html: { Data: payload.html, Charset: 'UTF-8' } }
                  : {}),
              },
            },
          }),
        );
    return { skipped: false, messageId: response.MessageId };
  }
}
