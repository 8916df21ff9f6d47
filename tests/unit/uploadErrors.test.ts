import multer from 'multer';
import { describe, it, expect } from 'vitest';
import { translateUploadError } from '../../server/routes/gallery';
import { ValidationError } from '../../server/middleware/errorHandler';

function fieldsOf(error: unknown) {
  if (!(error instanceof ValidationError)) throw new Error('Expected a ValidationError');
  return error.fields;
}

describe('translateUploadError', () => {
  it('should report oversized files against the kind field', () => {
    expect(fieldsOf(translateUploadError('image', new multer.MulterError('LIMIT_FILE_SIZE', 'image')))).toEqual({
      image: ['Make sure the image size is less than 2 Mb'],
    });
    expect(fieldsOf(translateUploadError('video', new multer.MulterError('LIMIT_FILE_SIZE', 'video')))).toEqual({
      video: ['File size should be less than 10MB.'],
    });
  });

  it('should report too many files as a non-field error', () => {
    expect(fieldsOf(translateUploadError('video', new multer.MulterError('LIMIT_FILE_COUNT')))).toEqual({
      non_field_errors: ['Cannot upload more than 10 videos.'],
    });
  });

  it('should name the unexpected field', () => {
    expect(fieldsOf(translateUploadError('image', new multer.MulterError('LIMIT_UNEXPECTED_FILE', 'photo')))).toEqual({
      photo: ['Unexpected field in upload.'],
    });
  });

  it('should keep multer\'s message for other limits', () => {
    expect(fieldsOf(translateUploadError('image', new multer.MulterError('LIMIT_PART_COUNT')))).toEqual({
      non_field_errors: ['Too many parts'],
    });
  });

  it('should pass other errors through', () => {
    const error = new Error('socket hang up');

    expect(translateUploadError('image', error)).toBe(error);
  });
});
