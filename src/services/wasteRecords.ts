/**
 * Waste record service
 *
 * Remote operations on waste records. Each mutation runs the matching
 * lifecycle function against the caller's copy first, so a transition the
 * state machine refuses is never sent. The returned record is always the one
 * the backend answered with.
 */

import type { DispatchRequest, RequestDispatcher } from '../lib/api/dispatcher';
import { API_ROUTES } from '../lib/api/routes';
import {
  isAdmin,
  parseWasteImage,
  parseWasteList,
  parseWasteRecord,
  toImageUploadBody,
  toWasteRecordBody,
  type Paginated,
  type UserIdentity,
  type WasteImage,
} from '../lib/api/types';
import { WasteTrackError } from '../lib/errors';
import { getCategory, type CategoryLookup } from '../state/categories';
import {
  appendImage,
  createWasteRecord,
  editWasteRecord,
  markCollected,
  processWasteRecord,
  rejectWasteRecord,
  validateWasteRecord,
} from '../state/wasteLifecycle';
import type {
  Disposition,
  WasteRecord,
  WasteRecordInput,
  WasteRecordPatch,
  WasteStatus,
  WasteType,
} from '../state/types';

export type WasteListFilters = {
  ownerId?: string;
  wasteType?: WasteType;
  status?: WasteStatus;
  page?: number;
  size?: number;
};

export type ProcessRequest = {
  notes: string;
  disposition?: Disposition;
};

/** The slice of the session controller the service reads */
export interface SessionView {
  getState(): { user: UserIdentity | null };
}

export class WasteRecordService {
  constructor(
    private readonly dispatcher: RequestDispatcher,
    private readonly session: SessionView,
    private readonly categories: CategoryLookup = getCategory,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async create(input: WasteRecordInput): Promise<WasteRecord> {
    const user = this.requireUser();
    createWasteRecord(input, user.id, { now: this.now() });
    return this.sendRecord({ method: 'POST', url: API_ROUTES.WASTE.CREATE, data: toWasteRecordBody(input) });
  }

  async get(id: string): Promise<WasteRecord> {
    return this.sendRecord({ url: API_ROUTES.WASTE.GET(id) });
  }

  async list(filters: WasteListFilters = {}): Promise<Paginated<WasteRecord>> {
    const data = await this.dispatcher.requestData<unknown>({
      url: API_ROUTES.WASTE.LIST,
      params: {
        user_id: filters.ownerId,
        waste_type: filters.wasteType,
        status: filters.status,
        page: filters.page,
        size: filters.size,
      },
    });
    return parseWasteList(data);
  }

  async update(record: WasteRecord, patch: WasteRecordPatch): Promise<WasteRecord> {
    const user = this.requireUser();
    editWasteRecord(record, user.id, patch, this.now());
    return this.sendRecord({ method: 'PUT', url: API_ROUTES.WASTE.UPDATE(record.id), data: toWasteRecordBody(patch) });
  }

  /**
   * Attach a `data:image/...` URL to a pending record the caller owns. The
   * backend stores the file and answers with where it lives; fetch the record
   * again to see the new path in `imagePaths`.
   */
  async uploadImage(record: WasteRecord, image: string): Promise<WasteImage> {
    const user = this.requireUser();
    appendImage(record, user.id, image, this.now());
    const data = await this.dispatcher.requestData<unknown>({
      method: 'POST',
      url: API_ROUTES.WASTE.UPLOAD_IMAGE(record.id),
      data: toImageUploadBody(image),
    });
    return parseWasteImage(data);
  }

  /** Owners can delete their own records; administrators can delete any */
  async remove(record: WasteRecord): Promise<void> {
    const user = this.requireUser();
    if (record.ownerId !== user.id && !isAdmin(user)) {
      throw new WasteTrackError('forbidden', 'Only the owner or an administrator can delete a waste record');
    }
    await this.dispatcher.execute({ method: 'DELETE', url: API_ROUTES.WASTE.DELETE(record.id) });
  }

  async collect(record: WasteRecord): Promise<WasteRecord> {
    this.requireAdmin();
    markCollected(record, this.now());
    return this.sendRecord({ method: 'POST', url: API_ROUTES.WASTE.COLLECT(record.id) });
  }

  async process(record: WasteRecord, req: ProcessRequest): Promise<WasteRecord> {
    const admin = this.requireAdmin();
    processWasteRecord(
      record,
      { processorId: admin.id, notes: req.notes, disposition: req.disposition },
      this.categories(record.wasteType),
      this.now(),
    );

    const body: Record<string, unknown> = {};
    if (req.notes.trim()) body.processing_notes = req.notes.trim();
    if (req.disposition) body.disposition = req.disposition;
    return this.sendRecord({ method: 'POST', url: API_ROUTES.WASTE.PROCESS(record.id), data: body });
  }

  async validate(record: WasteRecord, notes?: string | null): Promise<WasteRecord> {
    const admin = this.requireAdmin();
    const validated = validateWasteRecord(record, { adminId: admin.id, notes }, this.now());
    return this.sendRecord({
      method: 'POST',
      url: API_ROUTES.WASTE.VALIDATE(record.id),
      data: { validation_notes: validated.validationNotes },
    });
  }

  async reject(record: WasteRecord, notes: string): Promise<WasteRecord> {
    const admin = this.requireAdmin();
    const rejected = rejectWasteRecord(record, { adminId: admin.id, notes }, this.now());
    return this.sendRecord({
      method: 'POST',
      url: API_ROUTES.WASTE.REJECT(record.id),
      data: { notes: rejected.processingNotes },
    });
  }

  private async sendRecord(request: DispatchRequest): Promise<WasteRecord> {
    const data = await this.dispatcher.requestData<unknown>(request);
    return parseWasteRecord(data);
  }

  private requireUser(): UserIdentity {
    const user = this.session.getState().user;
    if (!user) throw new WasteTrackError('unauthorized', 'Sign in to manage waste records');
    return user;
  }

  private requireAdmin(): UserIdentity {
    const user = this.requireUser();
    if (!isAdmin(user)) {
      throw new WasteTrackError('forbidden', 'Administrator role required');
    }
    return user;
  }
}
