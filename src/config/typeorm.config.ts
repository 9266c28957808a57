import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions, TypeOrmOptionsFactory } from '@nestjs/typeorm';
import { Flowline } from '../shared/entities/flowline.entity';

@Injectable()
export class TypeOrmConfigService implements TypeOrmOptionsFactory {
  private readonly logger = new Logger(TypeOrmConfigService.name);

  constructor(private readonly configService: ConfigService) {}

  createTypeOrmOptions(): TypeOrmModuleOptions {
    // GeoJSON 파일 모드에서는 DB 연결하지 않음
    const manualInitialization =
      this.configService.get<string>('SEGMENT_SOURCE') === 'geojson';

    const options: TypeOrmModuleOptions = {
      type: 'postgres',
      host: this.configService.get<string>('DB_HOST'),
      port: Number(this.configService.get<string>('DB_PORT', '5432')),
      username: this.configService.get<string>('DB_USERNAME'),
      password: this.configService.get<string>('DB_PASSWORD'),
      database: this.configService.get<string>('DB_DATABASE'),
      schema: this.configService.get<string>('DATABASE_SCHEMA', 'public'),
      entities: [Flowline],
      synchronize: false,
      manualInitialization,
    };

    if (manualInitialization) {
      this.logger.log('SEGMENT_SOURCE=geojson, skipping database connection');
    }

    return options;
  }
}
