import { ArrayMaxSize, ArrayNotEmpty, IsArray, IsString } from "class-validator";

export const MAX_BATCH_SIZE = 100;

export class BatchInspectRequestDto {
  @IsArray()
  @ArrayNotEmpty()
  @ArrayMaxSize(MAX_BATCH_SIZE)
  @IsString({ each: true })
  urls!: string[];
}
