import { Module } from '@nestjs/common';
import { DocumentController } from './controllers/document.controller';
import { FolderController } from './controllers/folder.controller';
import { SearchController } from './controllers/search.controller';
import { DocumentModule } from '../document/document.module';

@Module({
  imports: [DocumentModule],
  controllers: [DocumentController, FolderController, SearchController],
})
export class ApiModule {}
