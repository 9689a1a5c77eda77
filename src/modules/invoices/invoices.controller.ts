import { Controller } from '@nestjs/common';
import { MessagePattern, Payload } from '@nestjs/microservices';

import { InvoicesSubjects } from '../../config';
import {
  CreateInvoiceDto,
  DeleteInvoiceDto,
  GetInvoiceDto,
  ImportInvoicesDto,
  ListInvoicesDto,
} from './dto';
import { InvoicesService } from './invoices.service';

@Controller()
export class InvoicesController {
  constructor(private readonly invoicesService: InvoicesService) {}

  @MessagePattern(InvoicesSubjects.create)
  create(@Payload() payload: CreateInvoiceDto) {
    return this.invoicesService.create(payload);
  }

  @MessagePattern(InvoicesSubjects.getById)
  getById(@Payload() payload: GetInvoiceDto) {
    return this.invoicesService.getById(payload.id);
  }

  @MessagePattern(InvoicesSubjects.list)
  list(@Payload() payload: ListInvoicesDto) {
    return this.invoicesService.list(payload);
  }

  @MessagePattern(InvoicesSubjects.delete)
  remove(@Payload() payload: DeleteInvoiceDto) {
    return this.invoicesService.remove(payload.id, payload.deletedBy);
  }

  @MessagePattern(InvoicesSubjects.import)
  import(@Payload() payload: ImportInvoicesDto) {
    return this.invoicesService.import(payload);
  }
}
