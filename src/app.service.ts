import { Injectable } from '@nestjs/common';
import { DIGEST_VARIANTS } from './digest/config/digest-variants';
import {
  SERVICE_NAME,
  SERVICE_VERSION,
} from './digest/config/digest.constants';

@Injectable()
export class AppService {
  getInfo(): { service: string; version: string; variants: string[] } {
    return {
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      variants: DIGEST_VARIANTS.map((variant) => variant.id),
    };
  }
}
