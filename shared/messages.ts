// User-facing validation and success messages.

export const ACCOUNT_MESSAGES = {
  firstName: {
    blank: 'first name can not be blank',
    required: 'first name required',
    invalid: 'first name must contain only alphabets',
    length: 'first name must be between 3 and 30 characters',
  },
  lastName: {
    blank: 'last name can not be blank',
    required: 'last name required',
    invalid: 'last name must contains only alphabets',
    length: 'last name must be between 3 and 30 characters',
  },
  username: {
    blank: 'username can not be blank',
    required: 'username required',
    invalid: 'username must contain alphabet and special character',
    length: 'username must be between 8 and 16 characters',
    exists: 'username already exist',
  },
  email: {
    blank: 'Email can not be blank',
    required: 'Email required',
    invalid: 'Enter a valid email address',
    exists: 'email already exist',
  },
  contact: {
    blank: 'contact can not be blank',
    required: 'contact required',
    invalid: 'invalid contact',
  },
  password: {
    blank: 'password can not be blank',
    required: 'password required',
    invalid: 'Password must contain uppercase, lowercase, digit and special character',
  },
  refresh: {
    required: 'refresh token required',
  },
  invalidCredentials: 'Invalid Credentials',
  invalidToken: 'Invalid Token',
  revokedToken: 'Token is blacklisted',
  updated: 'Updated Successfully',
} as const;

export const GALLERY_MESSAGES = {
  galleryName: {
    blank: 'Gallery name can not be blank',
    required: 'Please provide a gallery name',
    length: 'Gallery name must be between 5 and 20 characters',
    invalid: 'Gallery name can not contain path separators or start with a dot',
  },
  galleryId: {
    required: 'Please provide a gallery id',
    invalid: 'A valid integer is required',
  },
} as const;

export interface MediaKindMessages {
  galleryExists: string;
  noGalleries: string;
  noItems: string;
  itemRequired: string;
  maxSize: string;
  format: string;
  maxLimit: string;
  galleryCreated: string;
  galleryUpdated: string;
  galleryDeleted: string;
  itemsCreated: string;
  itemDeleted: string;
}

export const MEDIA_MESSAGES = {
  image: {
    galleryExists: 'Gallery with this name already exists',
    noGalleries: 'No album found',
    noItems: 'No images found',
    itemRequired: 'Please provide a image',
    maxSize: 'Make sure the image size is less than 2 Mb',
    format: 'Only jpg, jpeg, png, gif, webp and bmp images are allowed.',
    maxLimit: 'Cannot upload more than 10 images.',
    galleryCreated: 'Gallery created successfully',
    galleryUpdated: 'Gallery updated successfully',
    galleryDeleted: 'Gallery deleted successfully',
    itemsCreated: 'Image uploaded successfully',
    itemDeleted: 'Image deleted successfully',
  },
  video: {
    galleryExists: 'Video Gallery with this name already exists',
    noGalleries: 'No album found',
    noItems: 'No videos found',
    itemRequired: 'Please provide a video',
    maxSize: 'File size should be less than 10MB.',
    format: 'Only mp4 files are allowed.',
    maxLimit: 'Cannot upload more than 10 videos.',
    galleryCreated: 'Video Gallery created successfully',
    galleryUpdated: 'Video Gallery updated successfully',
    galleryDeleted: 'Video Gallery deleted successfully',
    itemsCreated: 'Video uploaded successfully',
    itemDeleted: 'Video deleted successfully',
  },
} as const satisfies Record<'image' | 'video', MediaKindMessages>;
