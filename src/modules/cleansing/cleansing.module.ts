import { Module } from '@nestjs/common';
import { CleansingController } from './cleansing.controller';
import { CleansingService } from './cleansing.service';
import { CANONICAL_REGISTRY, registryProvider } from './registry.provider';

@Module({
  controllers: [CleansingController],
  providers: [registryProvider, CleansingService],
  exports: [CANONICAL_REGISTRY, CleansingService],
})
export class CleansingModule {}
