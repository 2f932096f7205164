/**
 * Waste record lifecycle
 *
 *   pending -> collected -> processed -> recycled | disposed
 *   pending | collected -> rejected
 *
 * Every function here is pure: it checks the transition first and returns a
 * new record, or throws and leaves the input untouched. Persisting the result
 * is the caller's job.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { AlreadyValidatedError, InvalidTransitionError, WasteTrackError } from '../lib/errors';
import { getCategory } from './categories';
import { computeScore } from './scoring';
import {
  WASTE_TYPES,
  type Disposition,
  type WasteCategory,
  type WasteLocation,
  type WasteRecord,
  type WasteRecordInput,
  type WasteRecordPatch,
  type WasteStatus,
} from './types';

export const MAX_QUANTITY_KG = 1000;
const DEFAULT_UNIT = 'kg';
const DAY_MS = 24 * 60 * 60 * 1000;

const TRANSITIONS: Readonly<Record<WasteStatus, readonly WasteStatus[]>> = {
  pending: ['collected', 'rejected'],
  collected: ['processed', 'rejected'],
  processed: ['recycled', 'disposed'],
  recycled: [],
  disposed: [],
  rejected: [],
};

const locationSchema = z
  .object({
    label: z.string().max(255).nullable().optional(),
    address: z.string().nullable().optional(),
    latitude: z.number().min(-90).max(90).nullable().optional(),
    longitude: z.number().min(-180).max(180).nullable().optional(),
  })
  .strict();

const inputSchema = z.object({
  wasteType: z.enum(WASTE_TYPES),
  quantity: z.number().positive().max(MAX_QUANTITY_KG),
  unit: z.string().trim().min(1).max(20).optional(),
  description: z.string().nullable().optional(),
  location: locationSchema.optional(),
  imagePaths: z.array(z.string().trim().min(1)).optional(),
});

const patchSchema = inputSchema.partial();

export type ProcessAction = {
  processorId: string;
  notes: string;
  /** Omit to stop at `processed`; a later call with a disposition completes the record */
  disposition?: Disposition;
};

export type AdminNote = {
  adminId: string;
  notes: string;
};

export type ValidationAction = {
  adminId: string;
  notes?: string | null;
};

export function allowedTransitions(from: WasteStatus): readonly WasteStatus[] {
  return TRANSITIONS[from];
}

export function canTransition(from: WasteStatus, to: WasteStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: WasteStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function isCompleted(record: Pick<WasteRecord, 'status'>): boolean {
  return record.status === 'recycled' || record.status === 'disposed';
}

/** Whole days from creation to completion, or to `now` while the record is open */
export function durationDays(record: Pick<WasteRecord, 'createdAt' | 'completionDate'>, now: Date = new Date()): number {
  const end = record.completionDate ? Date.parse(record.completionDate) : now.getTime();
  return Math.max(0, Math.floor((end - Date.parse(record.createdAt)) / DAY_MS));
}

function assertTransition(record: WasteRecord, to: WasteStatus): void {
  if (!canTransition(record.status, to)) {
    throw new InvalidTransitionError(record.status, to);
  }
}

function invalid(message: string, details?: unknown): WasteTrackError {
  return new WasteTrackError('validation_error', message, { details });
}

function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw invalid(`${where}${issue?.message ?? 'Invalid waste record data'}`, result.error.issues);
  }
  return result.data;
}

function requireText(value: string | null | undefined, field: string): string {
  const text = typeof value === 'string' ? value.trim() : '';
  if (!text) throw invalid(`${field} is required`);
  return text;
}

function mergeLocation(base: WasteLocation, patch: Partial<WasteLocation> | undefined): WasteLocation {
  if (!patch) return base;
  return {
    label: patch.label !== undefined ? patch.label : base.label,
    address: patch.address !== undefined ? patch.address : base.address,
    latitude: patch.latitude !== undefined ? patch.latitude : base.latitude,
    longitude: patch.longitude !== undefined ? patch.longitude : base.longitude,
  };
}

const EMPTY_LOCATION: WasteLocation = { label: null, address: null, latitude: null, longitude: null };

export function createWasteRecord(
  input: WasteRecordInput,
  ownerId: string,
  opts: { id?: string; now?: Date } = {},
): WasteRecord {
  const owner = requireText(ownerId, 'ownerId');
  const data = parseWith(inputSchema, input);
  const ts = (opts.now ?? new Date()).toISOString();

  return {
    id: opts.id ?? randomUUID(),
    ownerId: owner,
    wasteType: data.wasteType,
    description: data.description ?? null,
    quantity: data.quantity,
    unit: data.unit ?? DEFAULT_UNIT,
    location: mergeLocation(EMPTY_LOCATION, data.location),
    imagePaths: [...(data.imagePaths ?? [])],
    status: 'pending',
    environmentalScore: 0,
    pointsAwarded: 0,
    isValidated: false,
    validatedBy: null,
    validationDate: null,
    validationNotes: null,
    processorId: null,
    processingNotes: null,
    createdAt: ts,
    collectionDate: null,
    processingDate: null,
    completionDate: null,
    updatedAt: ts,
  };
}

/** Owner-only edit of the free-form fields; allowed while the record is pending */
export function editWasteRecord(
  record: WasteRecord,
  actorId: string,
  patch: WasteRecordPatch,
  now: Date = new Date(),
): WasteRecord {
  if (record.ownerId !== actorId) {
    throw new WasteTrackError('forbidden', 'Only the owner can edit a waste record');
  }
  if (record.status !== 'pending') {
    throw new InvalidTransitionError(record.status, 'pending', 'edit');
  }
  const data = parseWith(patchSchema, patch);

  return {
    ...record,
    wasteType: data.wasteType ?? record.wasteType,
    quantity: data.quantity ?? record.quantity,
    unit: data.unit ?? record.unit,
    description: data.description !== undefined ? data.description : record.description,
    location: mergeLocation(record.location, data.location),
    imagePaths: data.imagePaths ? [...data.imagePaths] : record.imagePaths,
    updatedAt: now.toISOString(),
  };
}

export function appendImage(record: WasteRecord, actorId: string, imagePath: string, now: Date = new Date()): WasteRecord {
  return editWasteRecord(record, actorId, { imagePaths: [...record.imagePaths, imagePath] }, now);
}

export function markCollected(record: WasteRecord, now: Date = new Date()): WasteRecord {
  assertTransition(record, 'collected');
  const ts = now.toISOString();
  return { ...record, status: 'collected', collectionDate: ts, updatedAt: ts };
}

function complete(record: WasteRecord, disposition: Disposition, category: WasteCategory, ts: string): WasteRecord {
  assertTransition(record, disposition);
  const score = computeScore(record.quantity, category, disposition);
  return {
    ...record,
    status: disposition,
    environmentalScore: score.environmentalScore,
    pointsAwarded: score.pointsAwarded,
    completionDate: ts,
    updatedAt: ts,
  };
}

/**
 * collected -> processed, and on to the disposition when one is given.
 * processed -> recycled | disposed when called again with a disposition.
 */
export function processWasteRecord(
  record: WasteRecord,
  action: ProcessAction,
  category: WasteCategory = getCategory(record.wasteType),
  now: Date = new Date(),
): WasteRecord {
  if (record.status !== 'collected' && record.status !== 'processed') {
    throw new InvalidTransitionError(record.status, action.disposition ?? 'processed');
  }
  if (record.status === 'processed' && !action.disposition) {
    throw new InvalidTransitionError(record.status, 'processed');
  }
  if (category.name !== record.wasteType) {
    throw invalid(`Category '${category.name}' does not match waste type '${record.wasteType}'`);
  }

  const ts = now.toISOString();

  if (record.status === 'processed' && action.disposition) {
    const notes = typeof action.notes === 'string' && action.notes.trim() ? action.notes.trim() : record.processingNotes;
    return complete({ ...record, processingNotes: notes }, action.disposition, category, ts);
  }

  const processorId = requireText(action.processorId, 'processorId');
  const notes = requireText(action.notes, 'processingNotes');
  const processed: WasteRecord = {
    ...record,
    status: 'processed',
    processorId,
    processingNotes: notes,
    processingDate: ts,
    updatedAt: ts,
  };
  return action.disposition ? complete(processed, action.disposition, category, ts) : processed;
}

/** Administrative rejection from pending or collected; terminal, no completion date */
export function rejectWasteRecord(record: WasteRecord, action: AdminNote, now: Date = new Date()): WasteRecord {
  assertTransition(record, 'rejected');
  const adminId = requireText(action.adminId, 'adminId');
  const notes = requireText(action.notes, 'notes');
  const ts = now.toISOString();
  return { ...record, status: 'rejected', processorId: adminId, processingNotes: notes, updatedAt: ts };
}

export function validateWasteRecord(record: WasteRecord, action: ValidationAction, now: Date = new Date()): WasteRecord {
  if (record.isValidated) {
    throw new AlreadyValidatedError(record.id, record.validatedBy);
  }
  if (record.status === 'pending') {
    throw new InvalidTransitionError(record.status, record.status, 'validate');
  }
  const adminId = requireText(action.adminId, 'adminId');
  const ts = now.toISOString();
  const notes = typeof action.notes === 'string' && action.notes.trim() ? action.notes.trim() : null;
  return {
    ...record,
    isValidated: true,
    validatedBy: adminId,
    validationDate: ts,
    validationNotes: notes,
    updatedAt: ts,
  };
}
