import { ConfigService } from '@nestjs/config';

export function testConfig(values: Record<string, unknown> = {}): ConfigService {
  return new ConfigService(values);
}
