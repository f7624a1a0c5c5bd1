import { ApiProperty } from '@nestjs/swagger';
import { IsIn, IsOptional, IsString } from 'class-validator';
import { FolderSummary, TraversalOrder } from '../../folder/interfaces/folder.interface';

export class CreateFolderDto {
  @ApiProperty({
    description: 'Folder path, ancestors are created as needed',
    example: '/work/notes',
  })
  @IsString()
  path!: string;
}

export class ListFoldersQueryDto {
  @ApiProperty({ required: false, enum: ['dfs', 'bfs'], default: 'dfs' })
  @IsOptional()
  @IsIn(['dfs', 'bfs'])
  order?: TraversalOrder;
}

export class DeleteFolderQueryDto {
  @ApiProperty({ description: 'Folder path', example: '/work/notes' })
  @IsString()
  path!: string;
}

export class FolderResponseDto implements FolderSummary {
  @ApiProperty({ example: '/work/notes' })
  path!: string;

  @ApiProperty({ example: 'notes' })
  name!: string;

  @ApiProperty({ example: 3 })
  memberCount!: number;

  @ApiProperty({ example: 0 })
  childCount!: number;
}

export class ListFoldersResponseDto {
  @ApiProperty({ type: [FolderResponseDto] })
  folders!: FolderResponseDto[];

  @ApiProperty({ example: 2 })
  count!: number;
}
