import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { ApiBody, ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { DocumentService } from '../../document/document.service';
import {
  CreateDocumentDto,
  DocumentResponseDto,
  ListDocumentsQueryDto,
  ListDocumentsResponseDto,
  MoveDocumentDto,
  UpdateDocumentDto,
} from '../dtos/document.dto';

@ApiTags('Documents')
@Controller('api/documents')
export class DocumentController {
  constructor(private readonly documentService: DocumentService) {}

  @Post()
  @ApiOperation({
    summary: 'Create a document',
    description: 'Stores and indexes a document, filing it under the given folder.',
  })
  @ApiBody({
    type: CreateDocumentDto,
    examples: {
      withId: {
        summary: 'Document with specified ID',
        value: {
          id: 'note-42',
          title: 'Apple Pie',
          body: 'apple pie recipe',
          tags: ['dessert'],
          folderPath: '/recipes',
        },
      },
      withoutId: {
        summary: 'Document with generated ID',
        value: { title: 'Standup', body: 'blocked on review' },
      },
    },
  })
  @ApiResponse({ status: HttpStatus.CREATED, type: DocumentResponseDto })
  @ApiResponse({ status: HttpStatus.BAD_REQUEST, description: 'Invalid document fields' })
  @ApiResponse({ status: HttpStatus.CONFLICT, description: 'Document ID already in use' })
  createDocument(@Body() createDocumentDto: CreateDocumentDto): DocumentResponseDto {
    return this.documentService.createDocument(createDocumentDto);
  }

  @Get()
  @ApiOperation({ summary: 'List documents, optionally only those in one folder' })
  @ApiResponse({ status: HttpStatus.OK, type: ListDocumentsResponseDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Folder not found' })
  listDocuments(@Query() query: ListDocumentsQueryDto): ListDocumentsResponseDto {
    const documents = this.documentService.listDocuments(query.folderPath);
    return { documents, count: documents.length };
  }

  @Get(':id')
  @ApiOperation({
    summary: 'Get a document by ID',
    description: 'Each read counts as an access and raises the document in later rankings.',
  })
  @ApiParam({ name: 'id', example: 'note-42' })
  @ApiResponse({ status: HttpStatus.OK, type: DocumentResponseDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Document not found' })
  getDocument(@Param('id') id: string): DocumentResponseDto {
    return this.documentService.getDocument(id);
  }

  @Put(':id')
  @ApiOperation({ summary: 'Update fields of a document and re-index it' })
  @ApiParam({ name: 'id', example: 'note-42' })
  @ApiResponse({ status: HttpStatus.OK, type: DocumentResponseDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Document not found' })
  updateDocument(
    @Param('id') id: string,
    @Body() updateDocumentDto: UpdateDocumentDto,
  ): DocumentResponseDto {
    return this.documentService.updateDocument(id, updateDocumentDto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a document' })
  @ApiParam({ name: 'id', example: 'note-42' })
  @ApiResponse({ status: HttpStatus.NO_CONTENT, description: 'Document deleted' })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Document not found' })
  deleteDocument(@Param('id') id: string): void {
    this.documentService.deleteDocument(id);
  }

  @Post(':id/move')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Move a document to another folder' })
  @ApiParam({ name: 'id', example: 'note-42' })
  @ApiResponse({ status: HttpStatus.OK, type: DocumentResponseDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Document not found' })
  moveDocument(
    @Param('id') id: string,
    @Body() moveDocumentDto: MoveDocumentDto,
  ): DocumentResponseDto {
    return this.documentService.moveDocument(id, moveDocumentDto.folderPath);
  }
}
