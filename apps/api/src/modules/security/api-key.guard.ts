import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from "@nestjs/common";
import type { Request } from "express";

import { ConfigService } from "../config/config.service";

const LOOPBACK_HOSTS = new Set(["127.0.0.1", "::1", "localhost"]);

export function isLoopbackHost(host: string): boolean {
  return LOOPBACK_HOSTS.has(host.trim().toLowerCase());
}

@Injectable()
export class ApiKeyGuard implements CanActivate {
  constructor(private readonly configService: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const req = context.switchToHttp().getRequest<Request>();
    const path = req.path ?? req.url;

    if (path === "/health") {
      return true;
    }

    const { apiKey: expected, host } = this.configService.load().api;
    if (!expected) {
      // Keyless access only while the listener is bound to loopback.
      if (isLoopbackHost(host)) return true;
      throw new UnauthorizedException(`No API key configured; set one before listening on ${host}.`);
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
