import { Module } from '@nestjs/common';
import { SearchModule } from '../search/search.module';
import { DocumentService } from './document.service';

@Module({
  imports: [SearchModule],
  providers: [DocumentService],
  exports: [DocumentService],
})
export class DocumentModule {}
