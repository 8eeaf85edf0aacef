import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { CacheModule } from '@nestjs/cache-manager';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { HOTEL_REPOSITORY } from '@hotel-search/shared';

// Config
import { validateEnv } from './config/env.validation';

// Services
import { GeoSearchService } from './domain/services/geo-search.service';
import { HotelDomainService } from './domain/services/hotel.domain-service';
import { HotelSearchDomainService } from './domain/services/hotel-search.domain-service';
import { SearchCacheService, DEFAULT_SEARCH_CACHE_TTL_MS } from './domain/services/search-cache.service';

// Infrastructure
import { InMemoryHotelRepository } from './infrastructure/persistence/repositories/in-memory-hotel.repository';

// Controllers
import { HotelController } from './application/controllers/hotel.controller';
import { SearchController } from './application/controllers/search.controller';
import { HealthController } from './application/controllers/health.controller';

@Module({
    imports: [
        ConfigModule.forRoot({
            isGlobal: true,
            envFilePath: ['.env.local', '.env'],
            validate: validateEnv
        }),
        CacheModule.registerAsync({
            isGlobal: true,
            imports: [ConfigModule],
            inject: [ConfigService],
            useFactory: (configService: ConfigService) => ({
                ttl: configService.get<number>('SEARCH_CACHE_TTL_MS', DEFAULT_SEARCH_CACHE_TTL_MS),
                max: configService.get<number>('SEARCH_CACHE_MAX_ITEMS', 1000)
            })
        }),
        ThrottlerModule.forRootAsync({
            imports: [ConfigModule],
            inject: [ConfigService],
            useFactory: (configService: ConfigService) => [
                {
                    name: 'default',
                    ttl: configService.get<number>('THROTTLE_TTL_MS', 60_000),
                    limit: configService.get<number>('THROTTLE_LIMIT', 100)
                }
            ]
        })
    ],
    controllers: [HotelController, SearchController, HealthController],
    providers: [
        // Repositories (one store for the process lifetime)
        { provide: HOTEL_REPOSITORY, useClass: InMemoryHotelRepository },

        // Domain Services
        GeoSearchService,
        HotelDomainService,
        HotelSearchDomainService,
        SearchCacheService,

        // Guards
        { provide: APP_GUARD, useClass: ThrottlerGuard }
    ],
    exports: [HOTEL_REPOSITORY, GeoSearchService, HotelDomainService, HotelSearchDomainService]
})
export class AppModule { }
