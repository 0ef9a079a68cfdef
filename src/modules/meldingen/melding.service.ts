// src/modules/meldingen/melding.service.ts
// Purpose: Melder-side operations on a melding (token-authenticated) and
// the staff read side.

import { randomUUID } from "node:crypto";

import { NotFoundError } from "@/lib/errors/domain-error";
import { log, errorMeta } from "@/lib/observability/logger";
import { withTransactionRetry } from "@/lib/persistence/transaction-retry";
import type {
  MeldingListQuery,
  Repositories,
  Store,
} from "@/lib/persistence/store.types";
import type { AddressResolver } from "@/modules/address/address.resolver";
import type { Classifier } from "@/modules/classifications/classifier";
import type { FormLookup } from "@/modules/forms/form.lookup";
import { questionComponents, type Form } from "@/modules/forms/form.types";
import type { ReclassificationService } from "@/modules/reclassification/reclassification.service";
import type { RuleEvaluator } from "@/modules/rules/rule.types";
import type { TokenAuthority } from "@/modules/tokens/token.authority";
import { charCount } from "@/utils/text";
import {
  AssetTypeMismatchError,
  MaxAssetsExceededError,
  MeldingNotClassifiedError,
  MeldingNotEditableError,
  PrimaryValidationFailedError,
} from "./melding.errors";
import type { ContactInfo, LocationFeature } from "./melding.schemas";
import { MeldingState, type Asset, type Melding } from "./melding.types";
import type { MeldingLifecycleService } from "./meldingLifecycle.service";
import { TEXT_EDITABLE_STATES } from "./meldingLifecycle.transitions";
import { generatePublicId } from "./publicId";

const PUBLIC_ID_ATTEMPTS = 10;

export interface MeldingServiceDeps {
  store: Store;
  rules: RuleEvaluator;
  tokens: TokenAuthority;
  forms: FormLookup;
  classifier: Classifier;
  addressResolver: AddressResolver;
  lifecycle: MeldingLifecycleService;
  reclassification: ReclassificationService;
  now: () => Date;
}

export class MeldingService {
  constructor(private readonly deps: MeldingServiceDeps) {}

  ////////////////////////////////////////////////////////////////
  // Create
  ////////////////////////////////////////////////////////////////

  /**
   * The raw token is only ever returned here.
   */
  async create(text: string): Promise<{ melding: Melding; token: string }> {
    // 1. Primary form rules
    await this.validatePrimary(text);

    // 2. Classification happens before the write; the classifier is external
    const classificationId = await this.deps.classifier.classify(text);

    // 3. Credential
    const issued = this.deps.tokens.generate();

    // 4. Insert in NEW, then classify through the state machine
    const melding = await withTransactionRetry(
      this.deps.store,
      async (repos) => {
        const now = this.deps.now();
        const created: Melding = {
          id: randomUUID(),
          publicId: await this.freePublicId(repos),
          text,
          state: MeldingState.NEW,
          classificationId,
          token: issued.stored,
          location: null,
          address: null,
          email: null,
          phone: null,
          createdAt: now,
          updatedAt: now,
        };
        await repos.meldingen.insert(created);

        if (classificationId === null) return created;
        return this.deps.lifecycle.applyInTransaction(repos, created, "classify");
      },
      { label: "create_melding" },
    );

    log("INFO", "MELDING_CREATED", {
      meldingId: melding.id,
      publicId: melding.publicId,
      state: melding.state,
      classificationId: melding.classificationId,
    });

    return { melding, token: issued.token };
  }

  ////////////////////////////////////////////////////////////////
  // Melder reads
  ////////////////////////////////////////////////////////////////

  async retrieve(meldingId: string, token: string | undefined): Promise<Melding> {
    return this.deps.store.read((repos) => this.authenticated(repos, meldingId, token));
  }

  async questionForm(meldingId: string, token: string | undefined): Promise<Form> {
    return this.deps.store.read(async (repos) => {
      const melding = await this.authenticated(repos, meldingId, token);
      if (!melding.classificationId) throw new MeldingNotClassifiedError(meldingId);

      const form = await this.deps.forms.forClassification(repos, melding.classificationId);
      if (!form) throw new NotFoundError("Form for classification", melding.classificationId);
      return form;
    });
  }

  ////////////////////////////////////////////////////////////////
  // Melder writes
  ////////////////////////////////////////////////////////////////

  /**
   * Only while the melding is NEW or CLASSIFIED. A different classification
   * for the new text runs the reclassification cascade.
   */
  async updateText(
    meldingId: string,
    token: string | undefined,
    text: string,
  ): Promise<Melding> {
    await this.validatePrimary(text);
    const classificationId = await this.deps.classifier.classify(text);

    const { melding, outcome } = await withTransactionRetry(
      this.deps.store,
      async (repos) => {
        const current = await this.authenticated(repos, meldingId, token, true);

        if (!TEXT_EDITABLE_STATES.includes(current.state)) {
          throw new MeldingNotEditableError(current.state);
        }

        const updated = await repos.meldingen.update(meldingId, { text }, this.deps.now());
        return this.deps.reclassification.reclassifyInTransaction(
          repos,
          updated,
          classificationId,
        );
      },
      { label: "update_melding_text" },
    );

    this.deps.reclassification.logOutcome(melding, outcome);
    return melding;
  }

  async addLocation(
    meldingId: string,
    token: string | undefined,
    feature: LocationFeature,
  ): Promise<Melding> {
    const [lng, lat] = feature.geometry.coordinates;

    const melding = await withTransactionRetry(this.deps.store, async (repos) => {
      await this.authenticated(repos, meldingId, token, true);
      return repos.meldingen.update(
        meldingId,
        { location: { lat, lng }, address: null },
        this.deps.now(),
      );
    });

    this.enrichAddress(meldingId, lat, lng);
    return melding;
  }

  async addContactInfo(
    meldingId: string,
    token: string | undefined,
    contact: ContactInfo,
  ): Promise<Melding> {
    return withTransactionRetry(this.deps.store, async (repos) => {
      await this.authenticated(repos, meldingId, token, true);
      return repos.meldingen.update(
        meldingId,
        { email: contact.email ?? null, phone: contact.phone ?? null },
        this.deps.now(),
      );
    });
  }

  ////////////////////////////////////////////////////////////////
  // Assets
  ////////////////////////////////////////////////////////////////

  async addAsset(
    meldingId: string,
    token: string | undefined,
    input: { externalId: string; assetTypeId: string },
  ): Promise<Asset> {
    const asset = await withTransactionRetry(this.deps.store, async (repos) => {
      const melding = await this.authenticated(repos, meldingId, token, true);
      if (!melding.classificationId) throw new MeldingNotClassifiedError(meldingId);

      const classification = await repos.classifications.findById(melding.classificationId);
      if (!classification || classification.assetTypeId !== input.assetTypeId) {
        throw new AssetTypeMismatchError(input.assetTypeId);
      }

      const assetType = await repos.assetTypes.findById(input.assetTypeId);
      if (!assetType) throw new NotFoundError("AssetType", input.assetTypeId);

      const count = await repos.assets.countForMelding(meldingId);
      if (count >= assetType.maxAssets) {
        throw new MaxAssetsExceededError(assetType.maxAssets);
      }

      const created: Asset = {
        id: randomUUID(),
        externalId: input.externalId,
        assetTypeId: input.assetTypeId,
        meldingId,
        createdAt: this.deps.now(),
      };
      await repos.assets.insert(created);
      return created;
    });

    log("INFO", "ASSET_ADDED", { meldingId, assetId: asset.id });
    return asset;
  }

  async listAssets(meldingId: string, token: string | undefined): Promise<Asset[]> {
    return this.deps.store.read(async (repos) => {
      await this.authenticated(repos, meldingId, token);
      return repos.assets.listForMelding(meldingId);
    });
  }

  async removeAsset(
    meldingId: string,
    token: string | undefined,
    assetId: string,
  ): Promise<void> {
    await withTransactionRetry(this.deps.store, async (repos) => {
      await this.authenticated(repos, meldingId, token, true);
      const removed = await repos.assets.delete(meldingId, assetId);
      if (!removed) throw new NotFoundError("Asset", assetId);
    });
  }

  ////////////////////////////////////////////////////////////////
  // Staff reads
  ////////////////////////////////////////////////////////////////

  list(query: MeldingListQuery) {
    return this.deps.store.read((repos) => repos.meldingen.list(query));
  }

  async get(meldingId: string): Promise<Melding> {
    const melding = await this.deps.store.read((repos) => repos.meldingen.findById(meldingId));
    if (!melding) throw new NotFoundError("Melding", meldingId);
    return melding;
  }

  ////////////////////////////////////////////////////////////////
  // Internals
  ////////////////////////////////////////////////////////////////

  private async authenticated(
    repos: Repositories,
    meldingId: string,
    token: string | undefined,
    forUpdate = false,
  ): Promise<Melding> {
    const melding = forUpdate
      ? await repos.meldingen.findByIdForUpdate(meldingId)
      : await repos.meldingen.findById(meldingId);
    if (!melding) throw new NotFoundError("Melding", meldingId);

    this.deps.tokens.verify(melding, token);
    return melding;
  }

  /**
   * Without a primary form every text is accepted.
   */
  private async validatePrimary(text: string) {
    const primary = await this.deps.store.read((repos) => this.deps.forms.primary(repos));
    if (!primary) return;

    for (const component of questionComponents(primary)) {
      if (component.jsonLogic !== null) {
        const outcome = this.deps.rules.check(component.jsonLogic, { text });
        if (!outcome.ok) throw new PrimaryValidationFailedError(outcome.message);
      }

      if (
        component.type === "textarea" &&
        component.maxCharCount !== null &&
        charCount(text) > component.maxCharCount
      ) {
        throw new PrimaryValidationFailedError(
          `Text is longer than ${component.maxCharCount} characters`,
        );
      }
    }
  }

  private async freePublicId(repos: Repositories): Promise<string> {
    for (let i = 0; i < PUBLIC_ID_ATTEMPTS; i++) {
      const candidate = generatePublicId();
      if (!(await repos.meldingen.publicIdExists(candidate))) return candidate;
    }
    throw new Error("Could not draw a free public id");
  }

  /**
   * Fire-and-forget. The address is only written while the melding still
   * carries the location it was resolved for.
   */
  private enrichAddress(meldingId: string, lat: number, lng: number) {
    const run = async () => {
      const address = await this.deps.addressResolver.resolve(lat, lng);
      if (!address) return;

      await this.deps.store.transaction(async (repos) => {
        const current = await repos.meldingen.findByIdForUpdate(meldingId);
        const at = current?.location;
        if (!at || at.lat !== lat || at.lng !== lng) return;
        await repos.meldingen.update(meldingId, { address }, this.deps.now());
      });
    };

    void run().catch((err: unknown) => {
      log("WARN", "ADDRESS_ENRICHMENT_FAILED", { meldingId, ...errorMeta(err) });
    });
  }
}
