/**
 * Waste record domain types
 */

export const WASTE_TYPES = [
  'organic',
  'plastic',
  'paper',
  'glass',
  'metal',
  'electronic',
  'hazardous',
  'textile',
  'other',
] as const;

export type WasteType = (typeof WASTE_TYPES)[number];

export const WASTE_STATUSES = ['pending', 'collected', 'processed', 'recycled', 'disposed', 'rejected'] as const;

export type WasteStatus = (typeof WASTE_STATUSES)[number];

export type Disposition = 'recycled' | 'disposed';

export type WasteLocation = {
  label: string | null;
  address: string | null;
  latitude: number | null;
  longitude: number | null;
};

export interface WasteRecord {
  readonly id: string;
  readonly ownerId: string;
  readonly wasteType: WasteType;
  readonly description: string | null;
  readonly quantity: number;
  readonly unit: string;
  readonly location: WasteLocation;
  readonly imagePaths: readonly string[];
  readonly status: WasteStatus;
  readonly environmentalScore: number;
  readonly pointsAwarded: number;
  readonly isValidated: boolean;
  readonly validatedBy: string | null;
  readonly validationDate: string | null;
  readonly validationNotes: string | null;
  readonly processorId: string | null;
  readonly processingNotes: string | null;
  readonly createdAt: string;
  readonly collectionDate: string | null;
  readonly processingDate: string | null;
  readonly completionDate: string | null;
  readonly updatedAt: string;
}

export type WasteRecordInput = {
  wasteType: WasteType;
  quantity: number;
  unit?: string;
  description?: string | null;
  location?: Partial<WasteLocation>;
  imagePaths?: string[];
};

export type WasteRecordPatch = Partial<WasteRecordInput>;

export interface WasteCategory {
  name: WasteType;
  label: string;
  colorCode: string | null;
  icon: string | null;
  basePoints: number;
  /** Absent when no multiplier is configured for the category */
  environmentalMultiplier?: number;
}
