import { z } from 'zod';
import { isIsoDate } from '../../utils/dates';
import { ValidationFailureError } from '../../mcp/errors';

export const ChartKindSchema = z.enum(['single', 'collection']);
export type ChartKind = z.infer<typeof ChartKindSchema>;

export const EntryKindSchema = z.enum(['track', 'collection']);
export type EntryKind = z.infer<typeof EntryKindSchema>;

export function entryKindFor(kind: ChartKind): EntryKind {
  return kind === 'single' ? 'track' : 'collection';
}

const nonEmpty = z.string().trim().min(1);

export const TrackSchema = z.object({
  title: nonEmpty,
  artist: nonEmpty,
  artists: z.array(z.string()).default([]),
  image: z.string().default(''),
  album: z.string().default(''),
});

export const CollectionSchema = z.object({
  title: nonEmpty,
  artist: nonEmpty,
  artists: z.array(z.string()).default([]),
  image: z.string().default(''),
});

const rankField = z.number().int().positive();
const nonNegative = z.number().int().nonnegative();

export const EntrySchema = z
  .object({
    track: TrackSchema.optional(),
    collection: CollectionSchema.optional(),
    rank: rankField,
    weeks_on_chart: nonNegative.default(0),
    last_week: nonNegative.default(0),
    peak_position: nonNegative.default(0),
    peak_inferred: z.boolean().default(false),
  })
  .superRefine((entry, ctx) => {
    if (entry.track && entry.collection) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'entry cannot carry both a track and a collection',
      });
    }
    if (!entry.track && !entry.collection) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'entry must carry either a track or a collection',
      });
    }
  });

export const ChartDescriptorSchema = z.object({
  source: nonEmpty,
  title: nonEmpty,
  description: z.string().default(''),
  url: z.string().default(''),
  kind: ChartKindSchema,
});

export const ChartDocumentSchema = z
  .object({
    descriptor: ChartDescriptorSchema,
    published_date: z.string().refine(isIsoDate, 'published_date must be a YYYY-MM-DD date'),
    kind: ChartKindSchema,
    entries: z.array(EntrySchema),
  })
  .superRefine((doc, ctx) => {
    if (doc.kind !== doc.descriptor.kind) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['kind'],
        message: `document kind "${doc.kind}" disagrees with descriptor kind "${doc.descriptor.kind}"`,
      });
    }
    doc.entries.forEach((entry, index) => {
      const matches = doc.kind === 'single' ? Boolean(entry.track) : Boolean(entry.collection);
      if (!matches) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['entries', index],
          message: `entry at rank ${entry.rank} does not match chart kind "${doc.kind}"`,
        });
      }
      const previous = doc.entries[index - 1];
      if (previous && previous.rank > entry.rank) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['entries', index, 'rank'],
          message: `entries are not ordered by rank (${previous.rank} before ${entry.rank})`,
        });
      }
    });
  });

export type Track = Readonly<z.infer<typeof TrackSchema>>;
export type Collection = Readonly<z.infer<typeof CollectionSchema>>;
export type Entry = Readonly<z.infer<typeof EntrySchema>>;
export type ChartDescriptor = Readonly<z.infer<typeof ChartDescriptorSchema>>;
export type ChartDocument = Readonly<z.infer<typeof ChartDocumentSchema>>;

export type TrackInput = z.input<typeof TrackSchema>;
export type CollectionInput = z.input<typeof CollectionSchema>;
export type EntryInput = z.input<typeof EntrySchema>;
export type ChartDocumentInput = z.input<typeof ChartDocumentSchema>;

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(issue =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

function parseOrFail<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationFailureError(`invalid ${what}`, describeIssues(parsed.error));
  }
  return deepFreeze(parsed.data);
}

export function createTrack(input: TrackInput): Track {
  return parseOrFail(TrackSchema, input, 'track');
}

export function createCollection(input: CollectionInput): Collection {
  return parseOrFail(CollectionSchema, input, 'collection');
}

/** Throws ValidationFailureError unless exactly one of track/collection is set. */
export function createEntry(input: EntryInput): Entry {
  return parseOrFail(EntrySchema, input, 'chart entry');
}

export function createChartDescriptor(
  input: z.input<typeof ChartDescriptorSchema>
): ChartDescriptor {
  return parseOrFail(ChartDescriptorSchema, input, 'chart descriptor');
}

export function createChartDocument(input: ChartDocumentInput): ChartDocument {
  return parseOrFail(ChartDocumentSchema, input, 'chart document');
}

export type SerializedChart = z.output<typeof ChartDocumentSchema>;

/**
 * JSON-ready copy of a document. Entries keep only the field group they carry;
 * the other key is left out rather than set to null.
 */
export function serializeChart(doc: ChartDocument): SerializedChart {
  return {
    descriptor: { ...doc.descriptor },
    published_date: doc.published_date,
    kind: doc.kind,
    entries: doc.entries.map(entry => {
      const { track, collection, ...positions } = entry;
      return {
        ...(track ? { track: { ...track, artists: [...track.artists] } } : {}),
        ...(collection ? { collection: { ...collection, artists: [...collection.artists] } } : {}),
        ...positions,
      };
    }),
  };
}
