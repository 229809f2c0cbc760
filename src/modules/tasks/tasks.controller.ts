import { Controller, Post, Body } from '@nestjs/common';
import { TasksService } from './tasks.service';
import { CreateTaskDto, CreateTaskResponseDto } from './dto/create-task.dto';

@Controller('tasks')
export class TasksController {
  constructor(private readonly tasksService: TasksService) {}

  /**
   * POST /api/tasks
   * 创建转录任务
   */
  @Post()
  async createTask(@Body() dto: CreateTaskDto): Promise<CreateTaskResponseDto> {
    return this.tasksService.createTask(dto);
  }
}
