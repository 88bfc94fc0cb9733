// Static chip catalog: chip profiles plus the signature lookup tables the
// detection strategies consult. Tables are evaluated in declaration order, so
// more specific entries must precede the entries they contain.

import * as fs from 'fs-extra';
import * as path from 'path';
import { z } from 'zod';
import { CHIP_ID_PATTERN, VERSION_ID_PATTERN, defaultPatchPath } from './constants';
import { CatalogError } from './errors';
import { ChipProfile, FirmwareCandidate } from './types';

const ChipIdSchema = z.string().regex(CHIP_ID_PATTERN, 'chip id must look like bcm<model><revision>');

const CandidateSchema = z.object({
  versionId: z.string().regex(VERSION_ID_PATTERN),
  rank: z.number().int().nonnegative(),
  note: z.string().default(''),
  relativePatchPath: z.string().optional()
});

const FragmentSchema = z.object({
  fragment: z.string().regex(/^[0-9]+$/),
  chipId: ChipIdSchema
});

export const CatalogFileSchema = z.object({
  schemaVersion: z.literal(1),
  chips: z.array(z.object({
    chipId: ChipIdSchema,
    displayName: z.string().min(1),
    candidates: z.array(CandidateSchema).min(1)
  })).min(1),
  boardModels: z.array(z.object({ match: z.string().min(1), chipId: ChipIdSchema })),
  deviceCodenames: z.array(z.object({ device: z.string().min(1), deviceName: z.string().min(1), chipId: ChipIdSchema })),
  logFragments: z.array(FragmentSchema),
  firmwareFragments: z.array(FragmentSchema)
});

export type CatalogFile = z.infer<typeof CatalogFileSchema>;

export interface BoardModelEntry { match: string; chipId: string }
export interface DeviceCodenameEntry { device: string; deviceName: string; chipId: string }
export interface FragmentEntry { fragment: string; chipId: string }

export const DEFAULT_CATALOG_PATH = path.join(__dirname, '..', 'data', 'chip-catalog.json');

export class ChipCatalog {
  private readonly profiles = new Map<string, ChipProfile>();
  readonly boardModels: readonly BoardModelEntry[];
  readonly deviceCodenames: readonly DeviceCodenameEntry[];
  readonly logFragments: readonly FragmentEntry[];
  readonly firmwareFragments: readonly FragmentEntry[];

  constructor(data: CatalogFile) {
    for (const chip of data.chips) {
      if (this.profiles.has(chip.chipId)) throw new CatalogError(`duplicate chip id in catalog: ${chip.chipId}`);
      const candidates: FirmwareCandidate[] = chip.candidates.map(c => Object.freeze({
        versionId: c.versionId,
        rank: c.rank,
        note: c.note,
        relativePatchPath: c.relativePatchPath || defaultPatchPath(chip.chipId, c.versionId)
      }));
      this.profiles.set(chip.chipId, Object.freeze({
        chipId: chip.chipId,
        displayName: chip.displayName,
        candidates: Object.freeze(candidates)
      }));
    }
    const known = (chipId: string, table: string) => {
      if (!this.profiles.has(chipId)) throw new CatalogError(`${table} references unknown chip ${chipId}`);
    };
    data.boardModels.forEach(e => known(e.chipId, 'boardModels'));
    data.deviceCodenames.forEach(e => known(e.chipId, 'deviceCodenames'));
    data.logFragments.forEach(e => known(e.chipId, 'logFragments'));
    data.firmwareFragments.forEach(e => known(e.chipId, 'firmwareFragments'));
    this.boardModels = Object.freeze(data.boardModels.map(e => ({ ...e })));
    this.deviceCodenames = Object.freeze(data.deviceCodenames.map(e => ({ ...e })));
    this.logFragments = Object.freeze(data.logFragments.map(e => ({ ...e })));
    this.firmwareFragments = Object.freeze(data.firmwareFragments.map(e => ({ ...e })));
  }

  static fromJson(raw: unknown, origin = 'catalog'): ChipCatalog {
    const parsed = CatalogFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? issue.path.join('.') || '(root)' : '(root)';
      throw new CatalogError(`invalid ${origin} at ${where}: ${issue ? issue.message : 'unknown error'}`);
    }
    return new ChipCatalog(parsed.data);
  }

  static load(file: string = DEFAULT_CATALOG_PATH): ChipCatalog {
    let raw: unknown;
    try {
      raw = fs.readJsonSync(file);
    } catch (e: unknown) {
      throw new CatalogError(`unable to read chip catalog ${file}: ${e instanceof Error ? e.message : String(e)}`);
    }
    return ChipCatalog.fromJson(raw, path.basename(file));
  }

  listProfiles(): ChipProfile[] {
    return Array.from(this.profiles.values());
  }

  getProfile(chipId: string): ChipProfile | undefined {
    return this.profiles.get(chipId);
  }

  findCandidate(chipId: string, versionId: string): FirmwareCandidate | undefined {
    return this.profiles.get(chipId)?.candidates.find(c => c.versionId === versionId);
  }

  matchBoardModel(model: string): { entry: BoardModelEntry; profile: ChipProfile } | undefined {
    const entry = this.boardModels.find(e => model === e.match || model.includes(e.match));
    return entry ? this.withProfile(entry) : undefined;
  }

  matchDeviceCodename(device: string): { entry: DeviceCodenameEntry; profile: ChipProfile } | undefined {
    const entry = this.deviceCodenames.find(e => e.device === device);
    return entry ? this.withProfile(entry) : undefined;
  }

  // First fragment (declaration order) contained in the text
  matchLogFragment(text: string): FragmentEntry | undefined {
    return this.logFragments.find(e => text.includes(e.fragment));
  }

  matchFirmwareFilename(filename: string): FragmentEntry | undefined {
    return this.firmwareFragments.find(e => filename.includes(e.fragment));
  }

  // Numeric fragment used to recognise this chip's blobs by filename
  firmwareFragmentFor(chipId: string): string | undefined {
    return this.firmwareFragments.find(e => e.chipId === chipId)?.fragment;
  }

  private withProfile<T extends { chipId: string }>(entry: T): { entry: T; profile: ChipProfile } | undefined {
    const profile = this.profiles.get(entry.chipId);
    return profile ? { entry, profile } : undefined;
  }
}

// Recommendation order: rank ascending, catalog order breaks ties (Array#sort is stable)
export function rankCandidates(profile: ChipProfile): FirmwareCandidate[] {
  return [...profile.candidates].sort((a, b) => a.rank - b.rank);
}

let defaultCatalog: ChipCatalog | null = null;

export function getDefaultCatalog(): ChipCatalog {
  if (!defaultCatalog) defaultCatalog = ChipCatalog.load();
  return defaultCatalog;
}
