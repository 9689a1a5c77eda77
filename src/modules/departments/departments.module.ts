import { Module } from '@nestjs/common';

import { envs } from '../../config';
import { DEPARTMENT_DIRECTORY, loadDepartmentDirectory } from './departments.config';
import { DepartmentsService } from './departments.service';

@Module({
  providers: [
    {
      provide: DEPARTMENT_DIRECTORY,
      useFactory: () => loadDepartmentDirectory(envs.departmentsFile),
    },
    DepartmentsService,
  ],
  exports: [DepartmentsService],
})
export class DepartmentsModule {}
