import { CanActivate, ExecutionContext, Inject, Injectable, UnauthorizedException } from "@nestjs/common";
import type { Request } from "express";

import { ConfigService } from "../config/config.service";

/**
 * Requires `x-api-key` on every route but /health once `server.apiKey` is configured. The key is read
 * from the configuration validated at startup; later edits to the file need a restart.
 */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  private readonly expected: string | undefined;

  constructor(@Inject(ConfigService) configService: ConfigService) {
    this.expected = configService.load().server.apiKey;
  }

  canActivate(context: ExecutionContext): boolean {
    const req = context.switchToHttp().getRequest<Request>();
    const path = req.path ?? req.url;

    if (path === "/health") {
      return true;
    }

    const expected = this.expected;
    if (!expected) {
      return true;
    }

    const apiKey = req.header("x-api-key");
    if (!apiKey) {
      throw new UnauthorizedException("Missing x-api-key header.");
    }

    if (apiKey !== expected) {
      throw new UnauthorizedException("Invalid API key.");
    }

    return true;
  }
}
