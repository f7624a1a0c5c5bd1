import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Post, Query } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { DocumentService } from '../../document/document.service';
import {
  CreateFolderDto,
  DeleteFolderQueryDto,
  FolderResponseDto,
  ListFoldersQueryDto,
  ListFoldersResponseDto,
} from '../dtos/folder.dto';

@ApiTags('Folders')
@Controller('api/folders')
export class FolderController {
  constructor(private readonly documentService: DocumentService) {}

  @Post()
  @ApiOperation({ summary: 'Create a folder and any missing ancestors' })
  @ApiResponse({ status: HttpStatus.CREATED, type: FolderResponseDto })
  createFolder(@Body() createFolderDto: CreateFolderDto): FolderResponseDto {
    return this.documentService.createFolder(createFolderDto.path);
  }

  @Get()
  @ApiOperation({ summary: 'List every folder depth-first or breadth-first' })
  @ApiResponse({ status: HttpStatus.OK, type: ListFoldersResponseDto })
  listFolders(@Query() query: ListFoldersQueryDto): ListFoldersResponseDto {
    const folders = this.documentService.listFolders(query.order);
    return { folders, count: folders.length };
  }

  @Delete()
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({
    summary: 'Delete a folder and its subfolders',
    description: "Documents filed anywhere below the folder move to the folder's parent.",
  })
  @ApiResponse({ status: HttpStatus.NO_CONTENT, description: 'Folder deleted' })
  @ApiResponse({ status: HttpStatus.BAD_REQUEST, description: 'The root cannot be deleted' })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Folder not found' })
  deleteFolder(@Query() query: DeleteFolderQueryDto): void {
    this.documentService.deleteFolder(query.path);
  }
}
