import { IsBoolean, IsIn, IsOptional } from 'class-validator';
import { Transform, type TransformFnParams } from 'class-transformer';
import { SUPPORTED_LANGUAGES } from '@invoice-ocr/pipeline';

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off', '']);

/**
 * Multipart fields arrive as strings; anything unrecognized is left for
 * @IsBoolean to reject. Reads the raw field from the source object: implicit
 * conversion has already turned `value` into Boolean("false") === true.
 */
function toBoolean({ obj, key }: TransformFnParams): unknown {
  const value: unknown = Reflect.get(obj, key);
  if (typeof value !== 'string') return value;
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return value;
}

/**
 * Form fields accompanying POST /ocr/process. The file itself is handled
 * by Multer via @UploadedFile() and is not part of this DTO.
 */
export class ProcessDocumentDto {
  @IsOptional()
  @IsIn(SUPPORTED_LANGUAGES, {
    message: `language must be one of: ${SUPPORTED_LANGUAGES.join(', ')}`,
  })
  language: string = 'en';

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean({ message: 'use_gpu must be a boolean' })
  use_gpu: boolean = false;
}
