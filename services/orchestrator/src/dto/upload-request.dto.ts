import { IsOptional, IsString, MaxLength } from "class-validator";

export class UploadRequestDto {
  @IsOptional()
  @IsString()
  @MaxLength(512)
  reference?: string;
}
