// src/module/retention/retention.module.ts
import { Module } from '@nestjs/common';
import { ReadingsModule } from '../readings/readings.module';
import { RetentionController } from './retention.controller';
import { RetentionService } from './retention.service';

@Module({
  imports: [ReadingsModule],
  controllers: [RetentionController],
  providers: [RetentionService],
  exports: [RetentionService],
})
export class RetentionModule {}
