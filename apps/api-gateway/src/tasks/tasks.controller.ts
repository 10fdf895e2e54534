import { Controller, Delete, Get, Param, Query, UseGuards } from '@nestjs/common';
import { CurrentUser, JwtAuthGuard, type RequestUser } from '../auth';
import { TasksService } from './tasks.service';
import { ListTasksQueryDto } from './dto/list-tasks-query.dto';
import type { TaskDeletedResponse, TaskListResponse } from './dto/task-responses.dto';

/**
 * Routes:
 *   GET    /tasks           the caller's tasks, newest first, paginated
 *   DELETE /tasks/:taskId   remove a task, its result and its files
 */
@Controller('tasks')
@UseGuards(JwtAuthGuard)
export class TasksController {
  constructor(private readonly tasksService: TasksService) {}

  @Get()
  list(@Query() query: ListTasksQueryDto, @CurrentUser() user: RequestUser): Promise<TaskListResponse> {
    return this.tasksService.list(user.principal, query);
  }

  @Delete(':taskId')
  remove(@Param('taskId') taskId: string, @CurrentUser() user: RequestUser): Promise<TaskDeletedResponse> {
    return this.tasksService.delete(taskId, user.principal);
  }
}
