import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import helmet from 'helmet';
import compression from 'compression';
import { AppModule } from './app.module';

async function bootstrap() {
    const logger = new Logger('HotelService');

    const app = await NestFactory.create(AppModule);
    const configService = app.get(ConfigService);
    const environment = configService.get<string>('NODE_ENV', 'development');

    // Security middleware
    app.use(helmet({
        contentSecurityPolicy: environment === 'production' ? undefined : false,
    }));

    // Compression middleware
    app.use(compression());

    // CORS
    const corsOrigin = configService.get<string>('CORS_ORIGIN');
    app.enableCors({
        origin: corsOrigin ? corsOrigin.split(',') : '*',
        methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With'],
    });

    // Swagger documentation
    if (environment === 'development') {
        const config = new DocumentBuilder()
            .setTitle('Hotel Search API')
            .setDescription('Hotel management and proximity search ranked by price and distance')
            .setVersion('1.0')
            .addTag('Hotels', 'Hotel management operations')
            .addTag('Search', 'Proximity search operations')
            .addTag('Health', 'Service health')
            .build();

        const document = SwaggerModule.createDocument(app, config);
        SwaggerModule.setup('api/docs', app, document, {
            customSiteTitle: 'Hotel Search API Documentation',
        });
    }

    // Graceful shutdown
    const shutdown = (signal: string) => {
        logger.log(`${signal} received, shutting down gracefully`);
        app.close()
            .then(() => process.exit(0))
            .catch(error => {
                logger.error('Error during shutdown', error);
                process.exit(1);
            });
    };
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));

    const port = configService.get<number>('PORT', 3000);
    await app.listen(port);

    logger.log(`Hotel Service is running on port ${port}`);
    logger.log(`Health check available at http://localhost:${port}/health`);
    if (environment === 'development') {
        logger.log(`Swagger documentation available at http://localhost:${port}/api/docs`);
    }
}

bootstrap().catch(error => {
    console.error('Error starting Hotel Service:', error);
    process.exit(1);
});
