import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { ApiModule } from './api/api.module';
import searchConfig from './config/search.config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [searchConfig],
    }),
    ApiModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
