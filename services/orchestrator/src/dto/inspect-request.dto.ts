import { IsBase64, IsOptional, IsString, MaxLength, ValidateIf } from "class-validator";

export class InspectRequestDto {
  @ValidateIf((body: InspectRequestDto) => body.base64 === undefined)
  @IsString({ message: "url or base64 is required" })
  url?: string;

  @ValidateIf((body: InspectRequestDto) => body.url === undefined)
  @IsBase64()
  base64?: string;

  @IsOptional()
  @IsString()
  @MaxLength(512)
  reference?: string;
}
