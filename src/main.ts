import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import { AppModule } from "./app.module";
import { LoggerUtil } from "./common/logger/LoggerUtil";

async function bootstrap() {
  const app = await NestFactory.create(AppModule);

  const config = new DocumentBuilder()
    .setTitle("Dynamic Field Service")
    .setDescription("Dynamic field definitions, values, screens, search filters and import/export")
    .setVersion("1.0")
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup("api/swagger-docs", app, document);

  app.enableCors();
  const port = parseInt(process.env.PORT || "3000", 10);
  await app.listen(port);
  LoggerUtil.log(`Dynamic field service listening on port ${port}`, "bootstrap");
}

bootstrap().catch((error: unknown) => {
  LoggerUtil.error(
    "Failed to start application",
    error instanceof Error ? error.message : String(error),
    "bootstrap",
  );
  process.exit(1);
});
