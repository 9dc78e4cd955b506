import { Controller, Get, Post, Body, Param } from '@nestjs/common';
import { TranscriptionsService } from './transcriptions.service';
import { CreateTranscriptionDto, CreateTranscriptionResponseDto } from './dto/create-transcription.dto';
import { TranscriptionResponseDto } from './dto/transcription.dto';

@Controller('transcriptions')
export class TranscriptionsController {
  constructor(private readonly transcriptionsService: TranscriptionsService) {}

  /**
   * POST /api/transcriptions
   * 提交转录任务
   */
  @Post()
  async createTranscription(@Body() dto: CreateTranscriptionDto): Promise<CreateTranscriptionResponseDto> {
    return this.transcriptionsService.createTranscription(dto);
  }

  /**
   * GET /api/transcriptions/:id
   * 获取任务状态与结果
   */
  @Get(':id')
  async getTranscription(@Param('id') id: string): Promise<TranscriptionResponseDto> {
    return this.transcriptionsService.getTranscription(id);
  }
}
