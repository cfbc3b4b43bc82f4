import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { PipelineConfigLoaderService } from './pipeline-config-loader.service.js';
import { PIPELINE_CONFIG_TOKEN } from './pipeline-config.constants.js';

/**
 * Provides the validated PipelineConfig to every module.
 * A broken config file fails module initialisation, and with it startup.
 */
@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    PipelineConfigLoaderService,
    {
      provide: PIPELINE_CONFIG_TOKEN,
      useFactory: (loader: PipelineConfigLoaderService) => loader.load(),
      inject: [PipelineConfigLoaderService],
    },
  ],
  exports: [PIPELINE_CONFIG_TOKEN],
})
export class PipelineConfigModule {}
