// src/modules/forms/form.service.ts
// Purpose: Form CRUD. Every save rebuilds the whole tree with new questions;
// questions of the previous revision stay behind without a form.

import { randomUUID } from "node:crypto";

import { NotFoundError, RequestValidationError } from "@/lib/errors/domain-error";
import { log } from "@/lib/observability/logger";
import { withTransactionRetry } from "@/lib/persistence/transaction-retry";
import type { Repositories, Store } from "@/lib/persistence/store.types";
import { compileRule } from "@/modules/rules/compileRule";
import { InvalidExpressionError } from "@/modules/rules/rule.errors";
import { buildFormTree } from "./buildFormTree";
import type { FormLookup } from "./form.lookup";
import type {
  FormComponentInput,
  FormInput,
  PrimaryFormInput,
} from "./form.schemas";
import type { Form } from "./form.types";

export interface FormServiceDeps {
  store: Store;
  forms: FormLookup;
}

/**
 * Rejects a definition whose rules would only fail once a melder answers.
 */
function assertRulesCompile(inputs: FormComponentInput[]) {
  const errors: Record<string, string[]> = {};

  const check = (key: string, json: unknown) => {
    if (json === undefined) return;
    try {
      compileRule(json);
    } catch (err) {
      if (!(err instanceof InvalidExpressionError)) throw err;
      errors[`${key}.validate.json`] = [err.reason];
    }
  };

  for (const input of inputs) {
    if (input.type === "panel") {
      input.components.forEach((c) => check(c.key, c.validate?.json));
    } else {
      check(input.key, input.validate?.json);
    }
  }

  if (Object.keys(errors).length > 0) {
    throw new RequestValidationError(errors);
  }
}

export class FormService {
  constructor(private readonly deps: FormServiceDeps) {}

  ////////////////////////////////////////////////////////////////
  // Classification forms
  ////////////////////////////////////////////////////////////////

  list(): Promise<Form[]> {
    return this.deps.store.read((repos) => repos.forms.list());
  }

  async get(id: string): Promise<Form> {
    const form = await this.deps.store.read((repos) => repos.forms.findById(id));
    if (!form || form.kind !== "classification") {
      throw new NotFoundError("Form", id);
    }
    return form;
  }

  async getByClassification(classificationId: string): Promise<Form> {
    const form = await this.deps.store.read((repos) =>
      this.deps.forms.forClassification(repos, classificationId),
    );
    if (!form) throw new NotFoundError("Form for classification", classificationId);
    return form;
  }

  async create(input: FormInput): Promise<Form> {
    assertRulesCompile(input.components);

    const form = await withTransactionRetry(this.deps.store, (repos) =>
      this.write(repos, randomUUID(), input),
    );

    await this.deps.forms.invalidate([form.classificationId]);
    log("INFO", "FORM_CREATED", { formId: form.id, classificationId: form.classificationId });
    return form;
  }

  async update(id: string, input: FormInput): Promise<Form> {
    assertRulesCompile(input.components);

    const { form, previousClassificationId } = await withTransactionRetry(
      this.deps.store,
      async (repos) => {
        const current = await repos.forms.findById(id);
        if (!current || current.kind !== "classification") {
          throw new NotFoundError("Form", id);
        }

        await repos.questions.detachForm(id);
        const saved = await this.write(repos, id, input);
        return { form: saved, previousClassificationId: current.classificationId };
      },
    );

    await this.deps.forms.invalidate([previousClassificationId, form.classificationId]);
    log("INFO", "FORM_UPDATED", { formId: id, classificationId: form.classificationId });
    return form;
  }

  async delete(id: string): Promise<void> {
    const classificationId = await withTransactionRetry(
      this.deps.store,
      async (repos) => {
        const current = await repos.forms.findById(id);
        if (!current || current.kind !== "classification") {
          throw new NotFoundError("Form", id);
        }

        await repos.questions.detachForm(id);
        await repos.forms.delete(id);
        return current.classificationId;
      },
    );

    await this.deps.forms.invalidate([classificationId]);
    log("INFO", "FORM_DELETED", { formId: id });
  }

  ////////////////////////////////////////////////////////////////
  // Primary form
  ////////////////////////////////////////////////////////////////

  async getPrimary(): Promise<Form> {
    const form = await this.deps.store.read((repos) => this.deps.forms.primary(repos));
    if (!form) throw new NotFoundError("Form", "primary");
    return form;
  }

  async updatePrimary(input: PrimaryFormInput): Promise<Form> {
    assertRulesCompile(input.components);

    const form = await withTransactionRetry(this.deps.store, async (repos) => {
      const current = await repos.forms.findPrimary();
      const id = current?.id ?? randomUUID();

      const { components } = buildFormTree(id, "primary", input.components);
      const next: Form = {
        id,
        title: input.title,
        display: input.display,
        kind: "primary",
        classificationId: null,
        components,
      };
      await repos.forms.save(next);
      return next;
    });

    await this.deps.forms.invalidate([], true);
    log("INFO", "PRIMARY_FORM_UPDATED", { formId: form.id });
    return form;
  }

  ////////////////////////////////////////////////////////////////
  // Internals
  ////////////////////////////////////////////////////////////////

  /**
   * A classification holds at most one form: binding this one unbinds the other.
   */
  private async write(repos: Repositories, id: string, input: FormInput): Promise<Form> {
    const classificationId = input.classification ?? null;

    if (classificationId !== null) {
      const classification = await repos.classifications.findById(classificationId);
      if (!classification) throw new NotFoundError("Classification", classificationId);
      await repos.forms.unbindClassification(classificationId, id);
    }

    const { components, questions } = buildFormTree(id, "classification", input.components);

    const form: Form = {
      id,
      title: input.title,
      display: input.display,
      kind: "classification",
      classificationId,
      components,
    };

    // Form row first: questions reference it.
    await repos.forms.save(form);
    await repos.questions.insertMany(questions);
    return form;
  }
}
