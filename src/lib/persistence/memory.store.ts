// src/lib/persistence/memory.store.ts
// Purpose: In-process Store. Transactions run one at a time against a cloned
// draft which replaces the live state only when the callback resolves.

import type {
  Answer,
  Asset,
  Melding,
} from "@/modules/meldingen/melding.types";
import type { Classification } from "@/modules/classifications/classification.types";
import type { AssetType } from "@/modules/assets/assetType.types";
import type { Form, Question } from "@/modules/forms/form.types";
import type { Repositories, Store } from "./store.types";

interface MemoryState {
  meldingen: Map<string, Melding>;
  answers: Answer[];
  assets: Asset[];
  assetTypes: Map<string, AssetType>;
  classifications: Map<string, Classification>;
  forms: Map<string, Form>;
  questions: Map<string, Question>;
}

function emptyState(): MemoryState {
  return {
    meldingen: new Map(),
    answers: [],
    assets: [],
    assetTypes: new Map(),
    classifications: new Map(),
    forms: new Map(),
    questions: new Map(),
  };
}

const copy = <T>(value: T): T => structuredClone(value);

function byCreatedDesc(a: Melding, b: Melding): number {
  const diff = b.createdAt.getTime() - a.createdAt.getTime();
  if (diff !== 0) return diff;
  if (a.id === b.id) return 0;
  return a.id < b.id ? 1 : -1;
}

function repositoriesFor(state: MemoryState): Repositories {
  return {
    ////////////////////////////////////////////////////////////////
    // Meldingen
    ////////////////////////////////////////////////////////////////
    meldingen: {
      async findById(id) {
        const found = state.meldingen.get(id);
        return found ? copy(found) : null;
      },

      // Transactions are already serialized.
      async findByIdForUpdate(id) {
        const found = state.meldingen.get(id);
        return found ? copy(found) : null;
      },

      async publicIdExists(publicId) {
        for (const m of state.meldingen.values()) {
          if (m.publicId === publicId) return true;
        }
        return false;
      },

      async list({ limit, offset, state: filter }) {
        const all = [...state.meldingen.values()]
          .filter((m) => filter === undefined || m.state === filter)
          .sort(byCreatedDesc);

        return {
          items: all.slice(offset, offset + limit).map(copy),
          total: all.length,
        };
      },

      async insert(melding) {
        state.meldingen.set(melding.id, copy(melding));
      },

      async update(id, patch, updatedAt) {
        const current = state.meldingen.get(id);
        if (!current) {
          throw new Error(`Melding ${id} vanished during update`);
        }
        const next: Melding = { ...current, ...copy(patch), updatedAt };
        state.meldingen.set(id, next);
        return copy(next);
      },

      async compareAndSetState(id, expected, patch, updatedAt) {
        const current = state.meldingen.get(id);
        if (!current || current.state !== expected) return null;

        const next: Melding = { ...current, ...copy(patch), updatedAt };
        state.meldingen.set(id, next);
        return copy(next);
      },

      async findByClassificationForUpdate(classificationId) {
        return [...state.meldingen.values()]
          .filter((m) => m.classificationId === classificationId)
          .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
          .map(copy);
      },
    },

    ////////////////////////////////////////////////////////////////
    // Answers (append-only; later entries win)
    ////////////////////////////////////////////////////////////////
    answers: {
      async insert(answer) {
        state.answers.push(copy(answer));
      },

      async latestForMelding(meldingId) {
        const latest = new Map<string, { answer: Answer; index: number }>();

        state.answers.forEach((answer, index) => {
          if (answer.meldingId === meldingId) {
            latest.set(answer.questionId, { answer, index });
          }
        });

        return [...latest.values()]
          .sort((a, b) => a.index - b.index)
          .map((entry) => copy(entry.answer));
      },

      async deleteForMelding(meldingId) {
        const before = state.answers.length;
        state.answers = state.answers.filter((a) => a.meldingId !== meldingId);
        return before - state.answers.length;
      },
    },

    ////////////////////////////////////////////////////////////////
    // Assets
    ////////////////////////////////////////////////////////////////
    assets: {
      async insert(asset) {
        state.assets.push(copy(asset));
      },

      async listForMelding(meldingId) {
        return state.assets.filter((a) => a.meldingId === meldingId).map(copy);
      },

      async countForMelding(meldingId) {
        return state.assets.filter((a) => a.meldingId === meldingId).length;
      },

      async delete(meldingId, assetId) {
        const before = state.assets.length;
        state.assets = state.assets.filter(
          (a) => !(a.meldingId === meldingId && a.id === assetId),
        );
        return state.assets.length < before;
      },

      async deleteForMelding(meldingId) {
        const before = state.assets.length;
        state.assets = state.assets.filter((a) => a.meldingId !== meldingId);
        return before - state.assets.length;
      },
    },

    ////////////////////////////////////////////////////////////////
    // Asset types
    ////////////////////////////////////////////////////////////////
    assetTypes: {
      async findById(id) {
        const found = state.assetTypes.get(id);
        return found ? copy(found) : null;
      },

      async list() {
        return [...state.assetTypes.values()].map(copy);
      },

      async insert(assetType) {
        state.assetTypes.set(assetType.id, copy(assetType));
      },

      async update(assetType) {
        state.assetTypes.set(assetType.id, copy(assetType));
      },

      async delete(id) {
        if (!state.assetTypes.delete(id)) return false;
        state.assets = state.assets.filter((a) => a.assetTypeId !== id);
        for (const c of state.classifications.values()) {
          if (c.assetTypeId === id) c.assetTypeId = null;
        }
        return true;
      },
    },

    ////////////////////////////////////////////////////////////////
    // Classifications
    ////////////////////////////////////////////////////////////////
    classifications: {
      async findById(id) {
        const found = state.classifications.get(id);
        return found ? copy(found) : null;
      },

      async list() {
        return [...state.classifications.values()].map(copy);
      },

      async insert(classification) {
        state.classifications.set(classification.id, copy(classification));
      },

      async update(classification) {
        state.classifications.set(classification.id, copy(classification));
      },

      async delete(id) {
        return state.classifications.delete(id);
      },
    },

    ////////////////////////////////////////////////////////////////
    // Forms + questions
    ////////////////////////////////////////////////////////////////
    forms: {
      async findById(id) {
        const found = state.forms.get(id);
        return found ? copy(found) : null;
      },

      async findByClassificationId(classificationId) {
        for (const f of state.forms.values()) {
          if (f.classificationId === classificationId) return copy(f);
        }
        return null;
      },

      async findPrimary() {
        for (const f of state.forms.values()) {
          if (f.kind === "primary") return copy(f);
        }
        return null;
      },

      async list() {
        return [...state.forms.values()]
          .filter((f) => f.kind === "classification")
          .map(copy);
      },

      async save(form) {
        state.forms.set(form.id, copy(form));
      },

      async delete(id) {
        return state.forms.delete(id);
      },

      async unbindClassification(classificationId, keepFormId) {
        let count = 0;
        for (const f of state.forms.values()) {
          if (f.classificationId === classificationId && f.id !== keepFormId) {
            f.classificationId = null;
            count++;
          }
        }
        return count;
      },
    },

    questions: {
      async findById(id) {
        const found = state.questions.get(id);
        return found ? copy(found) : null;
      },

      async insertMany(questions) {
        for (const q of questions) state.questions.set(q.id, copy(q));
      },

      async detachForm(formId) {
        let count = 0;
        for (const q of state.questions.values()) {
          if (q.formId === formId) {
            q.formId = null;
            count++;
          }
        }
        return count;
      },
    },
  };
}

/**
 * Transactions run one at a time on a full copy of the state, so write cost
 * grows with the total amount of data. Meant for tests and local runs, not
 * for serving real traffic.
 */
export class MemoryStore implements Store {
  private state: MemoryState = emptyState();
  private queue: Promise<void> = Promise.resolve();

  async read<T>(fn: (repos: Repositories) => Promise<T>): Promise<T> {
    return fn(repositoriesFor(this.state));
  }

  transaction<T>(fn: (repos: Repositories) => Promise<T>): Promise<T> {
    const run = this.queue.then(async () => {
      const draft = copy(this.state);
      const result = await fn(repositoriesFor(draft));
      this.state = draft;
      return result;
    });

    // Keep the chain alive after a rollback; the caller still sees the rejection.
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );

    return run;
  }
}
