import { buildRawMessage } from './mime';

describe('buildRawMessage', () => {
  const build = (subject: string) =>
    buildRawMessage({
      from: 'store@example.com',
      to: 'buyer@example.com',
      subject,
      text: 'Thank you.',
      html: '<p>Thank you.</p>',
      attachments: [
        {
          filename: 'invoice-1.pdf',
          contentType: 'application/pdf',
          content: Buffer.from('%PDF-test'),
        },
      ],
      boundary: 'b1',
    }).toString('utf8');

  it('nests the bodies as alternatives beside the attachment', () => {
    const lines = build('Invoice 1').split('\r\n');

    expect(lines.slice(0, 5)).toEqual([
      'From: store@example.com',
      'To: buyer@example.com',
      'Subject: Invoice 1',
      'MIME-Version: 1.0',
      'Content-Type: multipart/mixed; boundary="mixed-b1"',
    ]);
    expect(lines).toContain('Content-Type: multipart/alternative; boundary="alt-b1"');
    expect(lines).toContain(Buffer.from('Thank you.').toString('base64'));
    expect(lines).toContain(Buffer.from('<p>Thank you.</p>').toString('base64'));
    expect(lines).toContain('Content-Disposition: attachment; filename="invoice-1.pdf"');
    expect(lines).toContain(Buffer.from('%PDF-test').toString('base64'));
    expect(lines.filter((line) => line === '--mixed-b1')).toHaveLength(2);
    expect(lines.filter((line) => line === '--alt-b1')).toHaveLength(2);
    expect(lines.slice(-2)).toEqual(['--mixed-b1--', '']);
  });

  it('encodes a subject outside printable ASCII', () => {
    const subject = 'Invoice ₹118';
    const lines = build(subject).split('\r\n');

    expect(lines[2]).toBe(
      `Subject: =?UTF-8?B?${Buffer.from(subject, 'utf8').toString('base64')}?=`,
    );
  });
});
