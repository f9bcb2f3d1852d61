import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance } from 'axios';

/**
 * Shared axios instance for outbound calls (reference tables, prediction service).
 */
@Injectable()
export class HttpClientProvider {
    private client: AxiosInstance;

    constructor(private configService: ConfigService) {
        const timeout = this.configService.get<number>('HTTP_TIMEOUT_MS') ?? 10_000;

        this.client = axios.create({
            timeout,
            headers: { 'User-Agent': 'iss-capital-passes/1.0' },
        });
    }

    getClient(): AxiosInstance {
        return this.client;
    }
}
