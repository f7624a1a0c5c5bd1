import { ApiProperty } from '@nestjs/swagger';
import { IsArray, IsNotEmpty, IsOptional, IsString } from 'class-validator';
import {
  CreateDocumentInput,
  StoredDocument,
  UpdateDocumentInput,
} from '../../document/interfaces/document.interface';

export class CreateDocumentDto implements CreateDocumentInput {
  @ApiProperty({
    description: 'Document ID (generated when omitted)',
    required: false,
    example: 'note-42',
  })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  id?: string;

  @ApiProperty({ description: 'Document title', example: 'Apple Pie' })
  @IsString()
  title!: string;

  @ApiProperty({ description: 'Document body', example: 'apple pie recipe' })
  @IsString()
  body!: string;

  @ApiProperty({
    description: 'Tags, indexed like the rest of the text',
    required: false,
    type: [String],
    example: ['dessert'],
  })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  tags?: string[];

  @ApiProperty({
    description: 'Folder to file the document in, created if missing',
    required: false,
    example: '/recipes/baking',
  })
  @IsOptional()
  @IsString()
  folderPath?: string;
}

export class UpdateDocumentDto implements UpdateDocumentInput {
  @ApiProperty({ required: false, example: 'Apple Crumble' })
  @IsOptional()
  @IsString()
  title?: string;

  @ApiProperty({ required: false, example: 'apple crumble recipe' })
  @IsOptional()
  @IsString()
  body?: string;

  @ApiProperty({ required: false, type: [String], example: ['dessert', 'autumn'] })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  tags?: string[];
}

export class MoveDocumentDto {
  @ApiProperty({ description: 'Target folder path', example: '/archive' })
  @IsString()
  folderPath!: string;
}

export class ListDocumentsQueryDto {
  @ApiProperty({ required: false, description: 'Only list members of this folder' })
  @IsOptional()
  @IsString()
  folderPath?: string;
}

export class DocumentResponseDto implements StoredDocument {
  @ApiProperty({ example: 'note-42' })
  id!: string;

  @ApiProperty({ example: 'Apple Pie' })
  title!: string;

  @ApiProperty({ example: 'apple pie recipe' })
  body!: string;

  @ApiProperty({ type: [String], example: ['dessert'] })
  tags!: string[];

  @ApiProperty({ example: '/recipes/baking' })
  folderPath!: string;

  @ApiProperty({ example: '2024-05-01T12:00:00.000Z' })
  createdAt!: string;

  @ApiProperty({ example: '2024-05-01T12:00:00.000Z' })
  lastAccessed!: string;
}

export class ListDocumentsResponseDto {
  @ApiProperty({ type: [DocumentResponseDto] })
  documents!: DocumentResponseDto[];

  @ApiProperty({ example: 1 })
  count!: number;
}
