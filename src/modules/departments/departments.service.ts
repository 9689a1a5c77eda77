import { Inject, Injectable } from '@nestjs/common';
import { RpcException } from '@nestjs/microservices';

import { DEPARTMENT_DIRECTORY, type DepartmentDirectory } from './departments.config';

export interface DepartmentAssignment {
  department: string;
  reviewer: string;
}

@Injectable()
export class DepartmentsService {
  constructor(@Inject(DEPARTMENT_DIRECTORY) private readonly directory: DepartmentDirectory) {}

  /** Reviewer responsible for `department`; fails listing the known departments. */
  resolve(department: string): DepartmentAssignment {
    const key = department.trim().toLowerCase();
    const reviewer = this.directory[key];

    if (reviewer === undefined) {
      throw new RpcException({
        status: 400,
        message: `Unknown department "${department}". Valid departments: ${this.names().join(', ')}`,
      });
    }

    return { department: key, reviewer };
  }

  names(): string[] {
    return Object.keys(this.directory).sort();
  }

  list(): DepartmentAssignment[] {
    return this.names().map((department) => ({
      department,
      reviewer: this.directory[department],
    }));
  }
}
