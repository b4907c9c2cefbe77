import { Module, Global } from '@nestjs/common';
import { OllamaService } from './ollama.service';
import { OllamaClassifierAdapter } from '../cleansing/classifier/ollama-classifier.adapter';
import { CLASSIFIER_ADAPTER } from '../cleansing/classifier/classifier-adapter';

@Global()
@Module({
  providers: [
    OllamaService,
    OllamaClassifierAdapter,
    { provide: CLASSIFIER_ADAPTER, useExisting: OllamaClassifierAdapter },
  ],
  exports: [OllamaService, CLASSIFIER_ADAPTER],
})
export class OllamaModule {}
