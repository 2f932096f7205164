import {
  AlreadyValidatedError,
  InvalidTransitionError,
  WasteTrackError,
} from '@/lib/errors';
import { getCategory } from '@/state/categories';
import {
  allowedTransitions,
  appendImage,
  canTransition,
  createWasteRecord,
  durationDays,
  editWasteRecord,
  isCompleted,
  isTerminal,
  markCollected,
  processWasteRecord,
  rejectWasteRecord,
  validateWasteRecord,
} from '@/state/wasteLifecycle';
import { WASTE_STATUSES, type WasteRecord, type WasteRecordInput, type WasteStatus } from '@/state/types';

const T0 = new Date('2024-03-01T10:00:00.000Z');
const T1 = new Date('2024-03-02T10:00:00.000Z');
const T2 = new Date('2024-03-03T10:00:00.000Z');
const T3 = new Date('2024-03-05T12:00:00.000Z');

function pendingPlastic(quantity = 10): WasteRecord {
  return createWasteRecord({ wasteType: 'plastic', quantity }, 'user-1', { id: 'rec-1', now: T0 });
}

function collectedPlastic(quantity = 10): WasteRecord {
  return markCollected(pendingPlastic(quantity), T1);
}

function inStatus(status: WasteStatus): WasteRecord {
  const pending = pendingPlastic();
  switch (status) {
    case 'pending':
      return pending;
    case 'collected':
      return markCollected(pending, T1);
    case 'processed':
      return processWasteRecord(markCollected(pending, T1), { processorId: 'admin-1', notes: 'sorted' }, undefined, T2);
    case 'recycled':
    case 'disposed':
      return processWasteRecord(
        markCollected(pending, T1),
        { processorId: 'admin-1', notes: 'sorted', disposition: status },
        undefined,
        T2,
      );
    case 'rejected':
      return rejectWasteRecord(pending, { adminId: 'admin-1', notes: 'photo missing' }, T1);
  }
}

describe('transition table', () => {
  it('lists the allowed edges', () => {
    expect(allowedTransitions('pending')).toEqual(['collected', 'rejected']);
    expect(allowedTransitions('collected')).toEqual(['processed', 'rejected']);
    expect(allowedTransitions('processed')).toEqual(['recycled', 'disposed']);
    expect(allowedTransitions('recycled')).toEqual([]);
  });

  it('marks terminal states', () => {
    expect(WASTE_STATUSES.filter(isTerminal)).toEqual(['recycled', 'disposed', 'rejected']);
    expect(canTransition('pending', 'recycled')).toBe(false);
    expect(canTransition('collected', 'rejected')).toBe(true);
  });
});

describe('createWasteRecord', () => {
  it('starts pending with no score', () => {
    const record = createWasteRecord(
      {
        wasteType: 'glass',
        quantity: 2.5,
        description: 'Bottles',
        location: { label: 'Depot A', latitude: 52.52, longitude: 13.405 },
        imagePaths: ['img/1.jpg'],
      },
      'user-1',
      { id: 'rec-9', now: T0 },
    );

    expect(record).toEqual({
      id: 'rec-9',
      ownerId: 'user-1',
      wasteType: 'glass',
      description: 'Bottles',
      quantity: 2.5,
      unit: 'kg',
      location: { label: 'Depot A', address: null, latitude: 52.52, longitude: 13.405 },
      imagePaths: ['img/1.jpg'],
      status: 'pending',
      environmentalScore: 0,
      pointsAwarded: 0,
      isValidated: false,
      validatedBy: null,
      validationDate: null,
      validationNotes: null,
      processorId: null,
      processingNotes: null,
      createdAt: '2024-03-01T10:00:00.000Z',
      collectionDate: null,
      processingDate: null,
      completionDate: null,
      updatedAt: '2024-03-01T10:00:00.000Z',
    });
  });

  it('generates an id when none is given', () => {
    const record = createWasteRecord({ wasteType: 'paper', quantity: 1 }, 'user-1');
    expect(record.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it.each<[string, WasteRecordInput]>([
    ['zero quantity', { wasteType: 'paper', quantity: 0 }],
    ['negative quantity', { wasteType: 'paper', quantity: -3 }],
    ['quantity above the limit', { wasteType: 'paper', quantity: 1000.5 }],
    ['long unit', { wasteType: 'paper', quantity: 1, unit: 'x'.repeat(21) }],
    ['latitude out of range', { wasteType: 'paper', quantity: 1, location: { latitude: 91 } }],
    ['longitude out of range', { wasteType: 'paper', quantity: 1, location: { longitude: -181 } }],
  ])('rejects %s', (_label, input) => {
    expect(() => createWasteRecord(input, 'user-1')).toThrow(WasteTrackError);
  });

  it('accepts the upper quantity limit', () => {
    expect(createWasteRecord({ wasteType: 'metal', quantity: 1000 }, 'user-1').quantity).toBe(1000);
  });

  it('names the offending field', () => {
    expect(() => createWasteRecord({ wasteType: 'paper', quantity: 0 }, 'user-1')).toThrow(/^quantity: /);
  });

  it('requires an owner', () => {
    expect(() => createWasteRecord({ wasteType: 'paper', quantity: 1 }, '  ')).toThrow('ownerId is required');
  });
});

describe('editing', () => {
  it('lets the owner patch a pending record', () => {
    const edited = editWasteRecord(pendingPlastic(), 'user-1', { quantity: 4, location: { address: '1 Main St' } }, T1);
    expect(edited.quantity).toBe(4);
    expect(edited.location).toEqual({ label: null, address: '1 Main St', latitude: null, longitude: null });
    expect(edited.updatedAt).toBe(T1.toISOString());
    expect(edited.createdAt).toBe(T0.toISOString());
  });

  it('refuses anyone but the owner', () => {
    expect(() => editWasteRecord(pendingPlastic(), 'user-2', { quantity: 4 })).toThrow(
      expect.objectContaining({ kind: 'forbidden' }),
    );
  });

  it('refuses once the record has left pending', () => {
    const collected = collectedPlastic();
    expect(() => editWasteRecord(collected, 'user-1', { quantity: 4 })).toThrow(InvalidTransitionError);
    expect(collected.quantity).toBe(10);
  });

  it('appends images in order', () => {
    const once = appendImage(pendingPlastic(), 'user-1', 'a.jpg', T1);
    const twice = appendImage(once, 'user-1', 'b.jpg', T1);
    expect(twice.imagePaths).toEqual(['a.jpg', 'b.jpg']);
    expect(once.imagePaths).toEqual(['a.jpg']);
  });
});

describe('processing', () => {
  it('scores 10 kg of recycled plastic at 12 with 50 points', () => {
    const done = processWasteRecord(
      collectedPlastic(),
      { processorId: 'admin-1', notes: 'baled', disposition: 'recycled' },
      getCategory('plastic'),
      T2,
    );

    expect(done.status).toBe('recycled');
    expect(done.environmentalScore).toBe(12);
    expect(done.pointsAwarded).toBe(50);
    expect(done.processorId).toBe('admin-1');
    expect(done.processingNotes).toBe('baled');
    expect(done.processingDate).toBe(T2.toISOString());
    expect(done.completionDate).toBe(T2.toISOString());
  });

  it('awards no points for disposed waste but keeps the score', () => {
    const done = processWasteRecord(
      collectedPlastic(),
      { processorId: 'admin-1', notes: 'contaminated', disposition: 'disposed' },
      getCategory('plastic'),
      T2,
    );

    expect(done.status).toBe('disposed');
    expect(done.environmentalScore).toBe(12);
    expect(done.pointsAwarded).toBe(0);
    expect(done.completionDate).toBe(T2.toISOString());
  });

  it('can stop at processed and complete later', () => {
    const processed = processWasteRecord(collectedPlastic(), { processorId: 'admin-1', notes: 'sorted' }, undefined, T2);
    expect(processed.status).toBe('processed');
    expect(processed.completionDate).toBeNull();
    expect(processed.pointsAwarded).toBe(0);

    const done = processWasteRecord(processed, { processorId: 'admin-2', notes: '', disposition: 'recycled' }, undefined, T3);
    expect(done.status).toBe('recycled');
    expect(done.processingNotes).toBe('sorted');
    expect(done.processorId).toBe('admin-1');
    expect(done.completionDate).toBe(T3.toISOString());
    expect(done.pointsAwarded).toBe(50);
  });

  it('requires a disposition to finish a processed record', () => {
    const processed = inStatus('processed');
    expect(() => processWasteRecord(processed, { processorId: 'admin-1', notes: 'again' })).toThrow(
      InvalidTransitionError,
    );
  });

  it('requires processing notes', () => {
    expect(() => processWasteRecord(collectedPlastic(), { processorId: 'admin-1', notes: '   ' })).toThrow(
      'processingNotes is required',
    );
  });

  it('refuses a category for another waste type', () => {
    expect(() =>
      processWasteRecord(collectedPlastic(), { processorId: 'admin-1', notes: 'x', disposition: 'recycled' }, getCategory('metal')),
    ).toThrow("Category 'metal' does not match waste type 'plastic'");
  });

  it('refuses to process a pending record', () => {
    const pending = pendingPlastic();
    let caught: unknown;
    try {
      processWasteRecord(pending, { processorId: 'admin-1', notes: 'x', disposition: 'recycled' });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(InvalidTransitionError);
    expect(caught).toMatchObject({ current: 'pending', requested: 'recycled' });
    expect(pending.status).toBe('pending');
  });
});

describe('status graph', () => {
  const actions: Array<[string, WasteStatus, (r: WasteRecord) => WasteRecord]> = [
    ['collect', 'collected', (r) => markCollected(r, T3)],
    ['process', 'processed', (r) => processWasteRecord(r, { processorId: 'admin-1', notes: 'n' }, undefined, T3)],
    [
      'recycle',
      'recycled',
      (r) => processWasteRecord(r, { processorId: 'admin-1', notes: 'n', disposition: 'recycled' }, undefined, T3),
    ],
    ['reject', 'rejected', (r) => rejectWasteRecord(r, { adminId: 'admin-1', notes: 'n' }, T3)],
  ];

  for (const from of WASTE_STATUSES) {
    for (const [name, target, act] of actions) {
      it(`${name} from ${from}`, () => {
        const record = inStatus(from);
        const snapshot = JSON.stringify(record);
        let result: WasteRecord | null = null;
        let error: unknown = null;
        try {
          result = act(record);
        } catch (e) {
          error = e;
        }

        expect(JSON.stringify(record)).toBe(snapshot);
        if (result) {
          expect(result.status).toBe(target);
          expect(result.completionDate !== null).toBe(isCompleted(result));
        } else {
          expect(error).toBeInstanceOf(InvalidTransitionError);
        }
      });
    }
  }
});

describe('rejection', () => {
  it('records who rejected and why, without a completion date', () => {
    const rejected = rejectWasteRecord(collectedPlastic(), { adminId: 'admin-1', notes: 'not plastic' }, T2);
    expect(rejected.status).toBe('rejected');
    expect(rejected.processorId).toBe('admin-1');
    expect(rejected.processingNotes).toBe('not plastic');
    expect(rejected.completionDate).toBeNull();
  });

  it('requires notes', () => {
    expect(() => rejectWasteRecord(pendingPlastic(), { adminId: 'admin-1', notes: '' })).toThrow('notes is required');
  });

  it('cannot reject a processed record', () => {
    expect(() => rejectWasteRecord(inStatus('processed'), { adminId: 'admin-1', notes: 'late' })).toThrow(
      "Cannot move waste record from 'processed' to 'rejected'",
    );
  });
});

describe('validation', () => {
  it('records the validator once', () => {
    const validated = validateWasteRecord(collectedPlastic(), { adminId: 'admin-1', notes: ' looks right ' }, T2);
    expect(validated).toMatchObject({
      isValidated: true,
      validatedBy: 'admin-1',
      validationDate: T2.toISOString(),
      validationNotes: 'looks right',
      status: 'collected',
    });
  });

  it('refuses a second validation and keeps the first', () => {
    const validated = validateWasteRecord(collectedPlastic(), { adminId: 'admin-1', notes: 'first' }, T2);

    expect(() => validateWasteRecord(validated, { adminId: 'admin-2', notes: 'second' }, T3)).toThrow(AlreadyValidatedError);
    expect(validated.validatedBy).toBe('admin-1');
    expect(validated.validationNotes).toBe('first');
  });

  it('refuses a pending record', () => {
    expect(() => validateWasteRecord(pendingPlastic(), { adminId: 'admin-1' })).toThrow(
      "Cannot validate a waste record in 'pending' status",
    );
  });

  it('allows validation after completion', () => {
    const validated = validateWasteRecord(inStatus('recycled'), { adminId: 'admin-1' }, T3);
    expect(validated.isValidated).toBe(true);
    expect(validated.validationNotes).toBeNull();
  });
});

describe('durationDays', () => {
  it('counts to completion, or to now while open', () => {
    expect(durationDays(inStatus('recycled'))).toBe(2);
    expect(durationDays(pendingPlastic(), T3)).toBe(4);
  });
});
