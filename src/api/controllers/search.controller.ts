import { Body, Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { DocumentService } from '../../document/document.service';
import {
  SearchQueryDto,
  SearchResponseDto,
  StatsResponseDto,
  SuggestQueryDto,
  SuggestResponseDto,
} from '../dtos/search.dto';

@ApiTags('Search')
@Controller('api')
export class SearchController {
  constructor(private readonly documentService: DocumentService) {}

  @Post('search')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Ranked keyword search',
    description:
      'Documents containing every query token are ranked first; when none do, documents ' +
      'containing any token are ranked instead.',
  })
  @ApiBody({
    type: SearchQueryDto,
    examples: {
      simple: { summary: 'Default result count', value: { query: 'apple recipe' } },
      limited: { summary: 'Top three', value: { query: 'meeting notes', topK: 3 } },
    },
  })
  @ApiResponse({ status: HttpStatus.OK, type: SearchResponseDto })
  @ApiResponse({ status: HttpStatus.BAD_REQUEST, description: 'Invalid query' })
  search(@Body() searchQueryDto: SearchQueryDto): SearchResponseDto {
    return this.documentService.search(searchQueryDto.query, searchQueryDto.topK);
  }

  @Post('autocomplete')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Suggest indexed tokens starting with a prefix' })
  @ApiResponse({ status: HttpStatus.OK, type: SuggestResponseDto })
  autocomplete(@Body() suggestQueryDto: SuggestQueryDto): SuggestResponseDto {
    return this.documentService.autocomplete(suggestQueryDto.prefix, suggestQueryDto.limit);
  }

  @Post('cache/clear')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Drop every cached result list' })
  clearCache(): void {
    this.documentService.clearCache();
  }

  @Get('stats')
  @ApiOperation({ summary: 'Index, cache and folder statistics' })
  @ApiResponse({ status: HttpStatus.OK, type: StatsResponseDto })
  getStats(): StatsResponseDto {
    return this.documentService.getStats();
  }
}
