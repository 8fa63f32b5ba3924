import {
  CanActivate,
  ExecutionContext,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { timingSafeEqual } from 'crypto';
import { SettingsService } from '../settings/settings.service';

const BEARER_PATTERN = /^Bearer\s+(\S+)\s*$/i;

function tokensMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Accepts requests whose `Authorization: Bearer <token>` header carries the
 * API token from the settings row.
 */
@Injectable()
export class ApiTokenGuard implements CanActivate {
  constructor(private readonly settingsService: SettingsService) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const match = BEARER_PATTERN.exec(request.headers.authorization ?? '');

    if (match) {
      const { apiToken } = await this.settingsService.get();
      if (tokensMatch(match[1], apiToken)) {
        return true;
      }
    }

    http.getResponse<Response>().setHeader('WWW-Authenticate', 'Bearer');
    throw new UnauthorizedException(
      match ? 'Invalid API key' : 'Missing bearer token',
    );
  }
}
