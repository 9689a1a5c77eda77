import { Equals, IsBase64, IsNotEmpty, IsString } from 'class-validator';

export const PDF_MIMETYPE = 'application/pdf';

export class SubmitDocumentDto {
  @IsBase64()
  buffer!: string;

  @IsString()
  @IsNotEmpty()
  filename!: string;

  @Equals(PDF_MIMETYPE, { message: 'Only PDF files are accepted' })
  mimetype!: string;

  @IsString()
  @IsNotEmpty()
  uploadedBy!: string;
}
