import type { GenerateOptions, GenerationPort } from '../../domain/ports/GenerationPort.js';
import { ServiceError } from '../../domain/errors/DomainErrors.js';

/**
 * 空生成實作：llm.provider 為 'none' 時使用
 * 一律拋出不可重試的 ServiceError，呼叫端仍能拿到檢索結果
 */
export class NullGenerationAdapter implements GenerationPort {
  readonly providerId = 'none';

  async generate(_prompt: string, _options: GenerateOptions): Promise<string> {
    throw new ServiceError('No language model is configured (llm.provider is "none")');
  }

  async isAvailable(): Promise<boolean> {
    return false;
  }
}
