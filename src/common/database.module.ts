import { Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { TypeOrmModule } from "@nestjs/typeorm";

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      useFactory: (configService: ConfigService) => ({
        type: "postgres",
        host: configService.get<string>("POSTGRES_HOST"),
        port: parseInt(configService.get<string>("POSTGRES_PORT") || "5432", 10),
        database: configService.get<string>("POSTGRES_DATABASE"),
        username: configService.get<string>("POSTGRES_USERNAME"),
        password: configService.get<string>("POSTGRES_PASSWORD"),
        autoLoadEntities: true,
        extra: {
          max: 20, // Number of connections in the pool (default is 10)
          idleTimeoutMillis: 30000, // 30 seconds
          connectionTimeoutMillis: 2000, // 2 seconds max to wait for a free connection
        },
      }),
      inject: [ConfigService],
    }),
  ],
  providers: [ConfigService],
})
export class DatabaseModule {}
