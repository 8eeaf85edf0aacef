import { Controller, Get } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { SkipThrottle } from '@nestjs/throttler';
import { HotelDomainService } from '../../domain/services/hotel.domain-service';

export interface HealthStatus {
    status: string;
    service: string;
    timestamp: string;
    uptime: number;
    hotelCount: number;
}

@ApiTags('Health')
@Controller('health')
@SkipThrottle()
export class HealthController {
    constructor(private readonly hotelDomainService: HotelDomainService) { }

    @Get()
    @ApiOperation({ summary: 'Health check endpoint' })
    @ApiResponse({ status: 200, description: 'Service health status' })
    async healthCheck(): Promise<HealthStatus> {
        return {
            status: 'ok',
            service: 'hotel-service',
            timestamp: new Date().toISOString(),
            uptime: process.uptime(),
            hotelCount: await this.hotelDomainService.countHotels()
        };
    }
}
