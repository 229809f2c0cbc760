import { IsArray, IsEmail, IsNotEmpty, IsOptional, IsString, IsUrl } from 'class-validator';

export class CreateTaskDto {
  @IsUrl({ protocols: ['http', 'https'], require_protocol: true })
  audio_url!: string;

  // 可为空：结果仍会归档/入库，只是不发邮件
  @IsArray()
  @IsEmail({}, { each: true })
  emails!: string[];

  @IsArray()
  @IsString({ each: true })
  @IsNotEmpty({ each: true })
  @IsOptional()
  keywords?: string[];
}

export class CreateTaskResponseDto {
  task_id!: string;
  status!: 'queued';
}
