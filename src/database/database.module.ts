import { Global, Module } from '@nestjs/common';

import { envs } from '../config';
import { DatabaseService } from './database.service';

@Global()
@Module({
  providers: [
    {
      provide: DatabaseService,
      useFactory: () => new DatabaseService(envs.databasePath),
    },
  ],
  exports: [DatabaseService],
})
export class DatabaseModule {}
