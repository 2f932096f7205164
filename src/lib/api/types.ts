/**
 * Wire schemas for backend payloads and their mapping to client types.
 * Every remote response goes through one of these before the rest of the
 * client sees it.
 */

import { z } from 'zod';
import { WASTE_STATUSES, WASTE_TYPES, type WasteRecord, type WasteRecordInput, type WasteRecordPatch } from '../../state/types';
import { ApiError, WasteTrackError } from '../errors';

export const USER_ROLES = ['user', 'admin', 'super_admin'] as const;
export type UserRole = (typeof USER_ROLES)[number];

export const USER_STATUSES = ['active', 'inactive', 'suspended', 'pending'] as const;
export type UserStatus = (typeof USER_STATUSES)[number];

export type UserIdentity = {
  id: string;
  email: string;
  username: string;
  firstName: string;
  lastName: string;
  role: UserRole;
  status: UserStatus;
  isActive: boolean;
  isVerified: boolean;
};

export type TokenPair = {
  accessToken: string;
  refreshToken: string;
  tokenType: string;
  expiresIn: number | null;
};

export type LoginResult = TokenPair & { user: UserIdentity };

export type RegisterData = {
  email: string;
  username: string;
  password: string;
  firstName: string;
  lastName: string;
  phone?: string;
  address?: string;
};

export type ProfileUpdate = {
  email?: string;
  username?: string;
  firstName?: string;
  lastName?: string;
  phone?: string | null;
  address?: string | null;
};

export type PasswordResetConfirmation = {
  token: string;
  newPassword: string;
  confirmPassword: string;
};

/** Result of asking the backend whether the current access token is still good */
export type TokenCheck = {
  valid: boolean;
  userId: string;
  username: string;
  role: UserRole;
};

export type WasteImage = {
  imageUrl: string;
  imagePath: string;
};

export type Paginated<T> = {
  items: T[];
  total: number;
  page: number;
  size: number;
  hasNext: boolean;
  hasPrevious: boolean;
};

const userWire = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  email: z.string().min(1),
  username: z.string(),
  first_name: z.string(),
  last_name: z.string(),
  role: z.enum(USER_ROLES),
  status: z.enum(USER_STATUSES),
  is_active: z.boolean(),
  is_verified: z.boolean(),
});

const tokenPairWire = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  token_type: z.string().default('bearer'),
  expires_in: z.number().nonnegative().nullable().optional(),
});

const loginWire = tokenPairWire.extend({ user: userWire });

const messageWire = z.object({ message: z.string() });

const tokenCheckWire = z.object({
  valid: z.boolean(),
  user_id: z.union([z.string().min(1), z.number()]).transform(String),
  username: z.string(),
  role: z.enum(USER_ROLES),
});

const wasteImageWire = z.object({
  image_url: z.string().min(1),
  image_path: z.string().min(1),
});

const isoDate = z.string().refine((v) => !Number.isNaN(Date.parse(v)), { message: 'Invalid date' });

const wasteRecordWire = z.object({
  id: z.string().min(1),
  user_id: z.string().min(1),
  waste_type: z.enum(WASTE_TYPES),
  description: z.string().nullable().optional(),
  quantity: z.number().nonnegative(),
  unit: z.string().default('kg'),
  location: z.string().nullable().optional(),
  latitude: z.number().nullable().optional(),
  longitude: z.number().nullable().optional(),
  address: z.string().nullable().optional(),
  image_paths: z.array(z.string()).nullable().optional(),
  status: z.enum(WASTE_STATUSES),
  environmental_score: z.number().default(0),
  points_awarded: z.number().int().default(0),
  is_validated: z.boolean().default(false),
  validated_by: z.string().nullable().optional(),
  validation_date: isoDate.nullable().optional(),
  validation_notes: z.string().nullable().optional(),
  processor_id: z.string().nullable().optional(),
  processing_notes: z.string().nullable().optional(),
  created_at: isoDate,
  collection_date: isoDate.nullable().optional(),
  processing_date: isoDate.nullable().optional(),
  completion_date: isoDate.nullable().optional(),
  updated_at: isoDate.nullable().optional(),
});

const wasteListWire = z.object({
  waste_records: z.array(wasteRecordWire),
  total: z.number().int().nonnegative(),
  page: z.number().int().positive(),
  size: z.number().int().nonnegative(),
  has_next: z.boolean(),
  has_previous: z.boolean(),
});

const profileUpdateInput = z.object({
  email: z.string().email().optional(),
  username: z
    .string()
    .min(3)
    .max(50)
    .regex(/^[a-zA-Z0-9_]+$/, 'Username must contain only letters, numbers, and underscores')
    .optional(),
  firstName: z.string().min(1).max(100).optional(),
  lastName: z.string().min(1).max(100).optional(),
  phone: z
    .string()
    .max(20)
    .regex(/^\+?[1-9]\d{0,15}$/, 'Invalid phone number format')
    .nullable()
    .optional(),
  address: z.string().nullable().optional(),
});

const passwordResetInput = z
  .object({
    token: z.string().min(1, 'Reset token is required'),
    newPassword: z
      .string()
      .min(8, 'Password must be at least 8 characters long')
      .regex(/[A-Z]/, 'Password must contain at least one uppercase letter')
      .regex(/[a-z]/, 'Password must contain at least one lowercase letter')
      .regex(/[0-9]/, 'Password must contain at least one digit')
      .regex(/[!@#$%^&*(),.?":{}|<>]/, 'Password must contain at least one special character'),
    confirmPassword: z.string(),
  })
  .refine((v) => v.newPassword === v.confirmPassword, {
    message: 'Passwords do not match',
    path: ['confirmPassword'],
  });

const imageDataUrl = z.string().startsWith('data:image/', 'Image must be a data:image/ URL');

/**
 * Check caller input before it is sent; failures are validation errors raised
 * locally, with no request made
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new WasteTrackError('validation_error', `${where}${issue?.message ?? 'Invalid data'}`, {
      details: result.error.issues,
    });
  }
  return result.data;
}

/**
 * Parse a backend payload, turning schema mismatches into a validation ApiError
 */
export function parseWire<S extends z.ZodTypeAny>(schema: S, payload: unknown, context: string): z.output<S> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const details = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    console.warn(`API Unexpected ${context} payload`, { details });
    throw new ApiError('validation_error', `Unexpected ${context} payload from server`, { details });
  }
  return result.data;
}

function toUser(w: z.output<typeof userWire>): UserIdentity {
  return {
    id: w.id,
    email: w.email,
    username: w.username,
    firstName: w.first_name,
    lastName: w.last_name,
    role: w.role,
    status: w.status,
    isActive: w.is_active,
    isVerified: w.is_verified,
  };
}

function toTokenPair(w: z.output<typeof tokenPairWire>): TokenPair {
  return {
    accessToken: w.access_token,
    refreshToken: w.refresh_token,
    tokenType: w.token_type,
    expiresIn: w.expires_in ?? null,
  };
}

function toWasteRecord(w: z.output<typeof wasteRecordWire>): WasteRecord {
  const createdAt = new Date(w.created_at).toISOString();
  const iso = (v: string | null | undefined) => (v ? new Date(v).toISOString() : null);
  return {
    id: w.id,
    ownerId: w.user_id,
    wasteType: w.waste_type,
    description: w.description ?? null,
    quantity: w.quantity,
    unit: w.unit,
    location: {
      label: w.location ?? null,
      address: w.address ?? null,
      latitude: w.latitude ?? null,
      longitude: w.longitude ?? null,
    },
    imagePaths: w.image_paths ?? [],
    status: w.status,
    environmentalScore: w.environmental_score,
    pointsAwarded: w.points_awarded,
    isValidated: w.is_validated,
    validatedBy: w.validated_by ?? null,
    validationDate: iso(w.validation_date),
    validationNotes: w.validation_notes ?? null,
    processorId: w.processor_id ?? null,
    processingNotes: w.processing_notes ?? null,
    createdAt,
    collectionDate: iso(w.collection_date),
    processingDate: iso(w.processing_date),
    completionDate: iso(w.completion_date),
    updatedAt: iso(w.updated_at) ?? createdAt,
  };
}

export function parseUser(payload: unknown): UserIdentity {
  return toUser(parseWire(userWire, payload, 'user'));
}

export function parseTokenPair(payload: unknown): TokenPair {
  return toTokenPair(parseWire(tokenPairWire, payload, 'token'));
}

export function parseLoginResponse(payload: unknown): LoginResult {
  const w = parseWire(loginWire, payload, 'login');
  return { ...toTokenPair(w), user: toUser(w.user) };
}

export function parseMessage(payload: unknown): string {
  return parseWire(messageWire, payload, 'message').message;
}

export function parseTokenCheck(payload: unknown): TokenCheck {
  const w = parseWire(tokenCheckWire, payload, 'token check');
  return { valid: w.valid, userId: w.user_id, username: w.username, role: w.role };
}

export function parseWasteImage(payload: unknown): WasteImage {
  const w = parseWire(wasteImageWire, payload, 'waste image');
  return { imageUrl: w.image_url, imagePath: w.image_path };
}

export function parseWasteRecord(payload: unknown): WasteRecord {
  return toWasteRecord(parseWire(wasteRecordWire, payload, 'waste record'));
}

export function parseWasteList(payload: unknown): Paginated<WasteRecord> {
  const w = parseWire(wasteListWire, payload, 'waste record list');
  return {
    items: w.waste_records.map(toWasteRecord),
    total: w.total,
    page: w.page,
    size: w.size,
    hasNext: w.has_next,
    hasPrevious: w.has_previous,
  };
}

/** Outbound body for create/update; only keys the caller set are sent */
export function toWasteRecordBody(input: WasteRecordInput | WasteRecordPatch): Record<string, unknown> {
  const body: Record<string, unknown> = {};
  if (input.wasteType !== undefined) body.waste_type = input.wasteType;
  if (input.quantity !== undefined) body.quantity = input.quantity;
  if (input.unit !== undefined) body.unit = input.unit;
  if (input.description !== undefined) body.description = input.description;
  if (input.location) {
    const loc = input.location;
    if (loc.label !== undefined) body.location = loc.label;
    if (loc.address !== undefined) body.address = loc.address;
    if (loc.latitude !== undefined) body.latitude = loc.latitude;
    if (loc.longitude !== undefined) body.longitude = loc.longitude;
  }
  if (input.imagePaths !== undefined) body.image_paths = [...input.imagePaths];
  return body;
}

export function toRegisterBody(data: RegisterData): Record<string, unknown> {
  return {
    email: data.email,
    username: data.username,
    password: data.password,
    first_name: data.firstName,
    last_name: data.lastName,
    ...(data.phone !== undefined ? { phone: data.phone } : {}),
    ...(data.address !== undefined ? { address: data.address } : {}),
  };
}

export function toProfileUpdateBody(update: ProfileUpdate): Record<string, unknown> {
  const v = parseInput(profileUpdateInput, update);
  const body: Record<string, unknown> = {};
  if (v.email !== undefined) body.email = v.email;
  if (v.username !== undefined) body.username = v.username;
  if (v.firstName !== undefined) body.first_name = v.firstName;
  if (v.lastName !== undefined) body.last_name = v.lastName;
  if (v.phone !== undefined) body.phone = v.phone;
  if (v.address !== undefined) body.address = v.address;
  if (Object.keys(body).length === 0) {
    throw new WasteTrackError('validation_error', 'Nothing to update');
  }
  return body;
}

export function toPasswordResetRequestBody(email: string): Record<string, unknown> {
  return { email: parseInput(z.string().trim().email('Invalid email address'), email) };
}

export function toPasswordResetConfirmBody(data: PasswordResetConfirmation): Record<string, unknown> {
  const v = parseInput(passwordResetInput, data);
  return { token: v.token, new_password: v.newPassword, confirm_password: v.confirmPassword };
}

export function toImageUploadBody(image: string): Record<string, unknown> {
  return { image: parseInput(imageDataUrl, image) };
}

export function isAdmin(user: Pick<UserIdentity, 'role'> | null | undefined): boolean {
  return user?.role === 'admin' || user?.role === 'super_admin';
}
