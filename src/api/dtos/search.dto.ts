import { ApiProperty } from '@nestjs/swagger';
import { IsInt, IsNotEmpty, IsOptional, IsString, Max, Min } from 'class-validator';
import { SearchResult } from '../../search/interfaces/search.interface';

export class SearchQueryDto {
  @ApiProperty({ description: 'Free-text query', example: 'apple recipe' })
  @IsString()
  @IsNotEmpty()
  query!: string;

  @ApiProperty({ description: 'Maximum number of results', required: false, example: 10 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(100)
  topK?: number;
}

export class SuggestQueryDto {
  @ApiProperty({ description: 'Prefix to complete', example: 'app' })
  @IsString()
  @IsNotEmpty()
  prefix!: string;

  @ApiProperty({ description: 'Maximum number of suggestions', required: false, example: 5 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(100)
  limit?: number;
}

export class SearchResultDto implements SearchResult {
  @ApiProperty({ example: 'note-42' })
  id!: string;

  @ApiProperty({ example: 'Apple Pie' })
  title!: string;

  @ApiProperty({ example: 'apple pie recipe' })
  body!: string;

  @ApiProperty({ type: [String], example: ['dessert'] })
  tags!: string[];

  @ApiProperty({ example: 0.4867 })
  relevanceScore!: number;
}

export class SearchResponseDto {
  @ApiProperty({ example: 'apple recipe' })
  query!: string;

  @ApiProperty({ type: [SearchResultDto] })
  results!: SearchResultDto[];

  @ApiProperty({ example: 1 })
  count!: number;

  @ApiProperty({ description: 'Milliseconds spent searching', example: 0 })
  took!: number;
}

export class SuggestResponseDto {
  @ApiProperty({ example: 'app' })
  prefix!: string;

  @ApiProperty({ type: [String], example: ['apple', 'application'] })
  suggestions!: string[];

  @ApiProperty({ example: 2 })
  count!: number;
}

export class StatsResponseDto {
  @ApiProperty({ example: 12 })
  documentCount!: number;

  @ApiProperty({ description: 'Tokens with at least one posting', example: 240 })
  vocabularySize!: number;

  @ApiProperty({ description: 'Tokens available to autocomplete', example: 251 })
  suggestionCount!: number;

  @ApiProperty({ example: 3 })
  cachedQueries!: number;

  @ApiProperty({ example: 100 })
  cacheCapacity!: number;

  @ApiProperty({ example: 4 })
  folderCount!: number;
}
