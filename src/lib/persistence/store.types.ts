// src/lib/persistence/store.types.ts
// Purpose: Persistence seam. Services receive a Store and only ever touch
// records through the repositories handed to them inside read/transaction.

import type {
  Answer,
  Asset,
  Melding,
  MeldingPatch,
  MeldingState,
} from "@/modules/meldingen/melding.types";
import type { Classification } from "@/modules/classifications/classification.types";
import type { AssetType } from "@/modules/assets/assetType.types";
import type { Form, Question } from "@/modules/forms/form.types";

export interface MeldingListQuery {
  limit: number;
  offset: number;
  state?: MeldingState;
}

export interface MeldingRepository {
  findById(id: string): Promise<Melding | null>;
  /** Row-locks the melding for the rest of the transaction where the store supports it. */
  findByIdForUpdate(id: string): Promise<Melding | null>;
  publicIdExists(publicId: string): Promise<boolean>;
  list(query: MeldingListQuery): Promise<{ items: Melding[]; total: number }>;
  insert(melding: Melding): Promise<void>;
  update(id: string, patch: MeldingPatch, updatedAt: Date): Promise<Melding>;
  /**
   * Applies `patch` only while the stored state still equals `expected`.
   * Returns null when another writer moved the melding first.
   */
  compareAndSetState(
    id: string,
    expected: MeldingState,
    patch: MeldingPatch,
    updatedAt: Date,
  ): Promise<Melding | null>;
  /** Row-locks every melding bound to the classification, in id order. */
  findByClassificationForUpdate(classificationId: string): Promise<Melding[]>;
}

export interface AnswerRepository {
  insert(answer: Answer): Promise<void>;
  /** Most recent answer per question, ordered by creation. */
  latestForMelding(meldingId: string): Promise<Answer[]>;
  deleteForMelding(meldingId: string): Promise<number>;
}

export interface AssetRepository {
  insert(asset: Asset): Promise<void>;
  listForMelding(meldingId: string): Promise<Asset[]>;
  countForMelding(meldingId: string): Promise<number>;
  delete(meldingId: string, assetId: string): Promise<boolean>;
  deleteForMelding(meldingId: string): Promise<number>;
}

export interface AssetTypeRepository {
  findById(id: string): Promise<AssetType | null>;
  list(): Promise<AssetType[]>;
  insert(assetType: AssetType): Promise<void>;
  update(assetType: AssetType): Promise<void>;
  /** Also unbinds classifications that pointed at it and drops its assets. */
  delete(id: string): Promise<boolean>;
}

export interface ClassificationRepository {
  findById(id: string): Promise<Classification | null>;
  list(): Promise<Classification[]>;
  insert(classification: Classification): Promise<void>;
  update(classification: Classification): Promise<void>;
  delete(id: string): Promise<boolean>;
}

export interface FormRepository {
  findById(id: string): Promise<Form | null>;
  findByClassificationId(classificationId: string): Promise<Form | null>;
  findPrimary(): Promise<Form | null>;
  list(): Promise<Form[]>;
  /** Inserts or fully replaces the form and its component tree. */
  save(form: Form): Promise<void>;
  delete(id: string): Promise<boolean>;
  /** Detaches every form bound to `classificationId` except `keepFormId`. */
  unbindClassification(
    classificationId: string,
    keepFormId: string | null,
  ): Promise<number>;
}

export interface QuestionRepository {
  findById(id: string): Promise<Question | null>;
  insertMany(questions: Question[]): Promise<void>;
  /** Orphans the questions of a form; their answers stay readable. */
  detachForm(formId: string): Promise<number>;
}

export interface Repositories {
  meldingen: MeldingRepository;
  answers: AnswerRepository;
  assets: AssetRepository;
  assetTypes: AssetTypeRepository;
  classifications: ClassificationRepository;
  forms: FormRepository;
  questions: QuestionRepository;
}

export interface Store {
  /** Non-transactional read view. */
  read<T>(fn: (repos: Repositories) => Promise<T>): Promise<T>;
  /**
   * All writes inside `fn` commit together or not at all. A conflict the
   * caller may retry surfaces as TransientStoreError.
   */
  transaction<T>(fn: (repos: Repositories) => Promise<T>): Promise<T>;
}
