import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DeliveryWarning } from '../common/errors';
import { buildInvoiceEmail } from '../mailer/email-templates';
import { MailerService } from '../mailer/mailer.service';
import type { Invoice } from './invoice';
import { renderInvoicePdf, StoreDetails } from './invoice-pdf';

export type DeliveryStatus =
  | { status: 'NOT_REQUESTED' }
  | { status: 'SENT'; recipient: string }
  | { status: 'SKIPPED'; recipient: string; reason: string }
  | { status: 'FAILED'; warning: DeliveryWarning };

@Injectable()
export class InvoiceDeliveryService {
  private readonly logger = new Logger(InvoiceDeliveryService.name);

  constructor(
    private readonly mailerService: MailerService,
    private readonly configService: ConfigService,
  ) {}

  get store(): StoreDetails {
    return {
      name: this.configService.get<string>('store.name') ?? 'Retail Store',
      address: this.configService.get<string>('store.address') ?? '',
    };
  }

  /** Never throws: a failed send comes back as a DeliveryWarning. */
  async deliver(
    invoice: Invoice,
    recipient: string | null,
  ): Promise<DeliveryStatus> {
    if (!recipient) {
      return { status: 'NOT_REQUESTED' };
    }
    const store = this.store;
    const email = buildInvoiceEmail(invoice, store.name);
    try {
      const result = await this.mailerService.sendEmail({
        to: recipient,
        ...email,
        attachments: [
          {
            filename: `invoice-${invoice.invoiceNo}.pdf`,
            contentType: 'application/pdf',
            content: await renderInvoicePdf(invoice, store),
          },
        ],
      });
      if (result.skipped) {
        this.logger.warn(
          `Invoice ${invoice.invoiceNo} not e-mailed to ${recipient}: ${result.reason}`,
        );
        return { status: 'SKIPPED', recipient, reason: result.reason };
      }
      return { status: 'SENT', recipient };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `Invoice ${invoice.invoiceNo} could not be e-mailed to ${recipient}: ${message}`,
      );
      return {
        status: 'FAILED',
        warning: new DeliveryWarning(
          recipient,
          `Sale was saved but the invoice e-mail failed: ${message}`,
        ),
      };
    }
  }
}
