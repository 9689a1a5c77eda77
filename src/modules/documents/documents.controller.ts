import { Controller } from '@nestjs/common';
import { MessagePattern, Payload } from '@nestjs/microservices';

import { InvoicesSubjects } from '../../config';
import { DocumentsService } from './documents.service';
import { SubmitDocumentDto } from './dto';

@Controller()
export class DocumentsController {
  constructor(private readonly documentsService: DocumentsService) {}

  @MessagePattern(InvoicesSubjects.submitDocument)
  submit(@Payload() payload: SubmitDocumentDto) {
    return this.documentsService.submit(payload);
  }
}
