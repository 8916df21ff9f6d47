import { z } from 'zod';
import type { MediaKind } from '@shared/schema';
import { FIELD_LENGTH, FIELD_PATTERNS, MAX_RECORD_ID } from '@shared/constants';
import { ACCOUNT_MESSAGES, GALLERY_MESSAGES } from '@shared/messages';
import { ValidationError, NON_FIELD_ERRORS, type FieldErrors } from '../middleware/errorHandler';

interface PresenceMessages {
  required: string;
  blank: string;
}

// Non-empty string; a missing or non-string value reports `required`
function text(messages: PresenceMessages) {
  return z
    .string({ required_error: messages.required, invalid_type_error: messages.required })
    .min(1, messages.blank);
}

const { firstName, lastName, username, email, contact, password } = ACCOUNT_MESSAGES;

const firstNameField = text(firstName)
  .regex(FIELD_PATTERNS.name, firstName.invalid)
  .min(FIELD_LENGTH.firstName.min, firstName.length)
  .max(FIELD_LENGTH.firstName.max, firstName.length);

const lastNameField = text(lastName)
  .regex(FIELD_PATTERNS.name, lastName.invalid)
  .min(FIELD_LENGTH.lastName.min, lastName.length)
  .max(FIELD_LENGTH.lastName.max, lastName.length);

const usernameField = text(username)
  .min(FIELD_LENGTH.username.min, username.length)
  .max(FIELD_LENGTH.username.max, username.length)
  .regex(FIELD_PATTERNS.username, username.invalid)
  .regex(/[a-zA-Z]/, username.invalid);

const emailField = text(email).email(email.invalid).max(FIELD_LENGTH.email.max, email.invalid);

// Digits are checked before the length so "12a456789" reads as invalid
const contactField = text(contact)
  .regex(FIELD_PATTERNS.contact, contact.invalid)
  .length(FIELD_LENGTH.contact.max, contact.invalid);

const passwordField = text(password).regex(FIELD_PATTERNS.password, password.invalid);

const galleryNameField = text(GALLERY_MESSAGES.galleryName)
  .min(FIELD_LENGTH.galleryName.min, GALLERY_MESSAGES.galleryName.length)
  .max(FIELD_LENGTH.galleryName.max, GALLERY_MESSAGES.galleryName.length)
  .regex(FIELD_PATTERNS.galleryName, GALLERY_MESSAGES.galleryName.invalid);

const refreshField = text({ required: ACCOUNT_MESSAGES.refresh.required, blank: ACCOUNT_MESSAGES.refresh.required });

// Multipart fields arrive as strings
const galleryIdField = z.preprocess(
  value => (typeof value === 'number' ? String(value) : value),
  z
    .string({
      required_error: GALLERY_MESSAGES.galleryId.required,
      invalid_type_error: GALLERY_MESSAGES.galleryId.invalid,
    })
    .trim()
    .regex(/^\d+$/, GALLERY_MESSAGES.galleryId.invalid)
    .transform(value => Number(value))
    .refine(value => value >= 1 && value <= MAX_RECORD_ID, GALLERY_MESSAGES.galleryId.invalid)
);

const signupSchema = z.object({
  first_name: firstNameField,
  last_name: lastNameField,
  username: usernameField,
  email: emailField,
  contact: contactField,
  password: passwordField,
});

const profileSchema = signupSchema;

export const operationSchemas = {
  signup: signupSchema,
  signin: z.object({ username: usernameField, password: passwordField }),
  signOut: z.object({ refresh: refreshField }),
  refresh: z.object({ refresh: refreshField }),
  emailCheck: z.object({ email: emailField }),
  usernameCheck: z.object({ username: usernameField }),
  profileReplace: profileSchema,
  profileUpdate: profileSchema.partial(),
  galleryCreate: z.object({ gallery_name: galleryNameField }),
  galleryRename: z.object({ gallery_name: galleryNameField }),
  imageUpload: z.object({ image_gallery_id: galleryIdField }),
  videoUpload: z.object({ video_gallery_id: galleryIdField }),
} as const;

export type Operation = keyof typeof operationSchemas;
export type OperationInput<K extends Operation> = z.output<(typeof operationSchemas)[K]>;

export type SignupInput = OperationInput<'signup'>;
export type ProfileUpdateInput = OperationInput<'profileUpdate'>;

/**
 * Keeps the first message per field, keyed by the top-level field name.
 */
export function toFieldErrors(error: z.ZodError): FieldErrors {
  const fields: FieldErrors = {};
  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? String(issue.path[0]) : NON_FIELD_ERRORS;
    if (!fields[field]) fields[field] = [issue.message];
  }
  return fields;
}

// Lets a generic operation name select its schema with the matching output type
const schemaTable: { [K in Operation]: z.ZodType<OperationInput<K>, z.ZodTypeDef, unknown> } = operationSchemas;

export function validate<K extends Operation>(operation: K, input: unknown): OperationInput<K> {
  const result = schemaTable[operation].safeParse(input ?? {});
  if (!result.success) {
    throw new ValidationError(toFieldErrors(result.error));
  }
  return result.data;
}

// Upload bodies name the gallery by kind: image_gallery_id / video_gallery_id
export function validateUploadBody(kind: MediaKind, body: unknown): number {
  if (kind === 'image') return validate('imageUpload', body).image_gallery_id;
  return validate('videoUpload', body).video_gallery_id;
}
