export type MailAttachment = {
  filename: string;
  contentType: string;
  content: Buffer;
};

export type RawMessageParts = {
  from: string;
  to: string;
  subject: string;
  text: string;
  html?: string;
  attachments: MailAttachment[];
  boundary: string;
};

const CRLF = '\r\n';

const encodeHeader = (value: string) =>
  /^[\x20-\x7e]*$/.test(value)
    ? value
    : `=?UTF-8?B?${Buffer.from(value, 'utf8').toString('base64')}?=`;

/** Base64 body lines may not exceed 76 characters. */
const base64Lines = (content: Buffer) =>
  (content.toString('base64').match(/.{1,76}/g) ?? []).join(CRLF);

const quoteFilename = (filename: string) => filename.replace(/["\\\r\n]/g, '_');

function textPart(contentType: string, body: string) {
  return [
    `Content-Type: ${contentType}; charset=UTF-8`,
    'Content-Transfer-Encoding: base64',
    '',
    base64Lines(Buffer.from(body, 'utf8')),
  ].join(CRLF);
}

/**
 * Builds a multipart/mixed message for SES SendRawEmail: the text and
 * optional HTML bodies as one alternative part, then each attachment.
 */
export function buildRawMessage(parts: RawMessageParts): Buffer {
  const mixed = `mixed-${parts.boundary}`;
  const alternative = `alt-${parts.boundary}`;

  const bodies = [textPart('text/plain', parts.text)];
  if (parts.html) {
    bodies.push(textPart('text/html', parts.html));
  }
  const body = [
    `Content-Type: multipart/alternative; boundary="${alternative}"`,
    '',
    ...bodies.map((part) => `--${alternative}${CRLF}${part}`),
    `--${alternative}--`,
  ].join(CRLF);

  const attachments = parts.attachments.map((attachment) => {
    const filename = quoteFilename(attachment.filename);
    return [
      `Content-Type: ${attachment.contentType}; name="${filename}"`,
      `Content-Disposition: attachment; filename="${filename}"`,
      'Content-Transfer-Encoding: base64',
      '',
      base64Lines(attachment.content),
    ].join(CRLF);
  });

  const message = [
    `From: ${parts.from}`,
    `To: ${parts.to}`,
    `Subject: ${encodeHeader(parts.subject)}`,
    'MIME-Version: 1.0',
    `Content-Type: multipart/mixed; boundary="${mixed}"`,
    '',
    ...[body, ...attachments].map((part) => `--${mixed}${CRLF}${part}`),
    `--${mixed}--`,
    '',
  ].join(CRLF);
  return Buffer.from(message, 'utf8');
}
