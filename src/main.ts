// OpenTelemetry must be imported FIRST before any other imports
import './shared/tracing/tracing';
import 'reflect-metadata';

import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import { Logger } from 'nestjs-pino';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';

async function bootstrap() {
    const app = await NestFactory.create(AppModule, { bufferLogs: true });

    // Use Pino logger
    app.useLogger(app.get(Logger));

    app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));

    // Swagger API documentation
    const config = new DocumentBuilder()
        .setTitle('ISS Capital Passes API')
        .setDescription('Upcoming ISS passes over U.S. state capitals, as a table and as map markers')
        .setVersion('1.0')
        .addTag('passes', 'Pass table and map markers')
        .addTag('predictions', 'Single-point pass predictions')
        .build();
    const document = SwaggerModule.createDocument(app, config);
    SwaggerModule.setup('api-docs', app, document);

    const port = process.env.PORT ?? 3000;
    await app.listen(port);

    app.get(Logger).log(`ISS Capital Passes API running on http://localhost:${port}`);
    app.get(Logger).log(`Swagger docs available at http://localhost:${port}/api-docs`);
}

bootstrap().catch((error: unknown) => {
    console.error('Failed to start', error);
    process.exit(1);
});
