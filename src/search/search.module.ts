import { Module } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import searchConfig from '../config/search.config';
import { SearchEngine } from './search-engine';

@Module({
  providers: [
    {
      provide: SearchEngine,
      useFactory: (config: ConfigType<typeof searchConfig>) =>
        new SearchEngine({ cacheCapacity: config.cacheCapacity }),
      inject: [searchConfig.KEY],
    },
  ],
  exports: [SearchEngine],
})
export class SearchModule {}
