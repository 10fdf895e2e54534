import { BadRequestException } from '@nestjs/common';
import { createValidationPipe } from '../../app.setup';
import { ProcessDocumentDto } from '../dto/process-document.dto';

describe('ProcessDocumentDto', () => {
  const pipe = createValidationPipe();

  function parse(body: Record<string, string>): Promise<ProcessDocumentDto> {
    return pipe.transform(body, { type: 'body', metatype: ProcessDocumentDto });
  }

  it.each([
    ['false', false],
    ['0', false],
    ['off', false],
    ['true', true],
    ['1', true],
    [' YES ', true],
  ])('reads use_gpu=%j as %s', async (raw, expected) => {
    const dto = await parse({ use_gpu: raw });
    expect(dto.use_gpu).toBe(expected);
  });

  it('defaults to English without acceleration', async () => {
    const dto = await parse({});
    expect(dto.language).toBe('en');
    expect(dto.use_gpu).toBe(false);
  });

  it('rejects a use_gpu value that is not a boolean', async () => {
    await expect(parse({ use_gpu: 'maybe' })).rejects.toBeInstanceOf(BadRequestException);
  });
});
