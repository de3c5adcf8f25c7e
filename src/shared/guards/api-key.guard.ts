import { Injectable, CanActivate, ExecutionContext, UnauthorizedException, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Request } from 'express';
import { timingSafeEqual } from 'crypto';

/**
 * Guards the cluster API with the `X-API-Key` header.
 */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  private readonly logger = new Logger(ApiKeyGuard.name);
  private readonly apiKey: string | undefined;

  constructor(private readonly configService: ConfigService) {
    this.apiKey = this.configService.get<string>('shardplane.main.apiKey');

    if (!this.apiKey) {
      this.logger.error('SHP_API_KEY not configured - every cluster API request will be rejected');
    }
  }

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();

    // Allow OPTIONS requests for CORS preflight
    if (request.method === 'OPTIONS') {
      return true;
    }

    const providedKey = this.extractApiKey(request);

    if (!providedKey) {
      this.logger.warn(`API request without credentials path=${request.path}`);
      throw new UnauthorizedException('Missing X-API-Key header');
    }

    if (!this.apiKey) {
      throw new UnauthorizedException('API authentication not configured');
    }

    if (!this.constantTimeCompare(providedKey, this.apiKey)) {
      this.logger.warn(`API request with invalid API key path=${request.path}`);
      throw new UnauthorizedException('Invalid API key');
    }

    return true;
  }

  /**
   * Constant-time string comparison.
   * Pads both inputs to a common length so the key length does not leak through timing.
   */
  private constantTimeCompare(a: string, b: string): boolean {
    const maxLen = Math.max(a.length, b.length, 32);
    const bufA = Buffer.alloc(maxLen);
    const bufB = Buffer.alloc(maxLen);
    Buffer.from(a, 'utf8').copy(bufA);
    Buffer.from(b, 'utf8').copy(bufB);

    const contentsEqual = timingSafeEqual(bufA, bufB);
    return contentsEqual && a.length === b.length;
  }

  private extractApiKey(request: Request): string | undefined {
    const header = request.headers['x-api-key'];
    return Array.isArray(header) ? header[0] : header;
  }
}
