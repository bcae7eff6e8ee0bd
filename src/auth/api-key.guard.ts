import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { timingSafeEqual } from 'crypto';

interface HeaderCarrier {
    headers: Record<string, string | string[] | undefined>;
}

@Injectable()
export class ApiKeyGuard implements CanActivate {
    constructor(private readonly configService: ConfigService) {}

    canActivate(context: ExecutionContext): boolean {
        const apiKey = this.configService.get<string>('app.apiKey');
        if (!apiKey) {
            // No key configured: the API is open
            return true;
        }

        const request = context.switchToHttp().getRequest<HeaderCarrier>();
        const presented = request.headers['x-api-key'];

        if (typeof presented === 'string' && sameKey(presented, apiKey)) {
            return true;
        }

        throw new UnauthorizedException('Invalid API Key');
    }
}

function sameKey(presented: string, expected: string): boolean {
    const a = Buffer.from(presented);
    const b = Buffer.from(expected);
    return a.length === b.length && timingSafeEqual(a, b);
}
