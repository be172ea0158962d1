import { ApiProperty } from "@nestjs/swagger";

/**
 * Base64 delivery of a generated grid image
 */
export class GenerateImageResponseDto {
  @ApiProperty({ example: true })
  success!: boolean;

  @ApiProperty({ example: "Grid availability image generated successfully" })
  message!: string;

  @ApiProperty({ example: "1024x250px" })
  image_size!: string;

  @ApiProperty({ description: "PNG bytes, base64 without line breaks" })
  image_base64!: string;

  @ApiProperty({ example: "image/png" })
  mime_type!: string;
}
