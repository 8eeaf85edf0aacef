import { plainToInstance, Type } from 'class-transformer';
import { IsEnum, IsInt, IsOptional, IsString, Max, Min, validateSync } from 'class-validator';

export enum Environment {
    Development = 'development',
    Production = 'production',
    Test = 'test'
}

export class EnvironmentVariables {
    @IsEnum(Environment)
    NODE_ENV: Environment = Environment.Development;

    @Type(() => Number)
    @IsInt()
    @Min(1)
    @Max(65535)
    PORT: number = 3000;

    @IsOptional()
    @IsString()
    CORS_ORIGIN?: string;

    @Type(() => Number)
    @IsInt()
    @Min(0)
    SEARCH_CACHE_TTL_MS: number = 120_000;

    @Type(() => Number)
    @IsInt()
    @Min(1)
    SEARCH_CACHE_MAX_ITEMS: number = 1000;

    @Type(() => Number)
    @IsInt()
    @Min(1)
    THROTTLE_TTL_MS: number = 60_000;

    @Type(() => Number)
    @IsInt()
    @Min(1)
    THROTTLE_LIMIT: number = 100;
}

export function validateEnv(config: Record<string, unknown>): EnvironmentVariables {
    const validated = plainToInstance(EnvironmentVariables, config);
    const errors = validateSync(validated, { skipMissingProperties: false });

    if (errors.length > 0) {
        const details = errors
            .map(error => Object.values(error.constraints ?? {}).join(', '))
            .join('; ');
        throw new Error(`Invalid environment variables: ${details}`);
    }
    return validated;
}
