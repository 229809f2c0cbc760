import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PIPELINE_CONFIG, buildPipelineConfig } from '../../common/config/pipeline.config';
import { TranscriptionsModule } from '../transcriptions/transcriptions.module';
import { PipelineService } from './pipeline.service';
import { SegmentExtractorService } from './segment-extractor.service';
import { WorkDirSweeperService } from './work-dir-sweeper.service';

@Module({
  imports: [TranscriptionsModule],
  providers: [
    {
      provide: PIPELINE_CONFIG,
      useFactory: buildPipelineConfig,
      inject: [ConfigService],
    },
    PipelineService,
    SegmentExtractorService,
    WorkDirSweeperService,
  ],
  exports: [PipelineService],
})
export class PipelineModule {}
