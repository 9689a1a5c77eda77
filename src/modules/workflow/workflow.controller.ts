import { Controller } from '@nestjs/common';
import { MessagePattern, Payload } from '@nestjs/microservices';

import { WorkflowSubjects } from '../../config';
import { ApproveInvoiceDto, CompleteCodingDto, DeptQueueDto, RejectInvoiceDto } from './dto';
import { WorkflowService } from './workflow.service';

@Controller()
export class WorkflowController {
  constructor(private readonly workflowService: WorkflowService) {}

  @MessagePattern(WorkflowSubjects.pendingCoding)
  pendingCoding() {
    return this.workflowService.pendingCoding();
  }

  @MessagePattern(WorkflowSubjects.completeCoding)
  completeCoding(@Payload() payload: CompleteCodingDto) {
    return this.workflowService.completeCoding(payload);
  }

  @MessagePattern(WorkflowSubjects.departments)
  departments() {
    return this.workflowService.listDepartments();
  }

  @MessagePattern(WorkflowSubjects.deptQueue)
  deptQueue(@Payload() payload: DeptQueueDto) {
    return this.workflowService.deptQueue(payload.reviewer);
  }

  @MessagePattern(WorkflowSubjects.approve)
  approve(@Payload() payload: ApproveInvoiceDto) {
    return this.workflowService.approve(payload);
  }

  @MessagePattern(WorkflowSubjects.reject)
  reject(@Payload() payload: RejectInvoiceDto) {
    return this.workflowService.reject(payload);
  }

  @MessagePattern(WorkflowSubjects.health)
  health() {
    return this.workflowService.health();
  }
}
