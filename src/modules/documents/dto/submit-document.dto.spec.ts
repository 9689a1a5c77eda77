import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';

import { SubmitDocumentDto } from './submit-document.dto';

describe('SubmitDocumentDto', () => {
  const upload = (mimetype: string) =>
    plainToInstance(SubmitDocumentDto, {
      buffer: Buffer.from('%PDF-1.7').toString('base64'),
      filename: 'acme-may.pdf',
      mimetype,
      uploadedBy: 'clerk.test',
    });

  it('accepts a PDF upload', async () => {
    expect(await validate(upload('application/pdf'))).toEqual([]);
  });

  it('rejects an image upload', async () => {
    const errors = await validate(upload('image/png'));

    expect(errors).toHaveLength(1);
    expect(errors[0].property).toBe('mimetype');
    expect(errors[0].constraints).toEqual({ equals: 'Only PDF files are accepted' });
  });
});
