import { DynamicModule, Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { TasksController } from './tasks.controller';
import { TasksService } from './tasks.service';
import { TasksProcessor } from './tasks.processor';
import { PipelineModule } from '../pipeline/pipeline.module';
import { TRANSCRIPTIONS_QUEUE } from './constants';

@Module({})
export class TasksModule {
  /**
   * redisEnabled 为 false 时不注册队列和消费者，任务在 API 进程内执行
   */
  static register(redisEnabled: boolean): DynamicModule {
    return {
      module: TasksModule,
      imports: [
        ...(redisEnabled ? [BullModule.registerQueue({ name: TRANSCRIPTIONS_QUEUE })] : []),
        PipelineModule,
      ],
      controllers: [TasksController],
      providers: [TasksService, ...(redisEnabled ? [TasksProcessor] : [])],
      exports: [TasksService],
    };
  }
}
