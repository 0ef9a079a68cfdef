// src/services.ts
// Purpose: Wire services from explicit collaborators. No module-level singletons.

import type { FormCache } from "@/lib/cache/form-cache";
import type { Store } from "@/lib/persistence/store.types";
import {
  NullAddressResolver,
  type AddressResolver,
} from "@/modules/address/address.resolver";
import { AnswerService } from "@/modules/answers/answer.service";
import { AnswerValidator } from "@/modules/answers/answer.validator";
import { AssetTypeService } from "@/modules/assets/assetType.service";
import { ClassificationService } from "@/modules/classifications/classification.service";
import {
  KeywordClassifier,
  type Classifier,
} from "@/modules/classifications/classifier";
import { FormLookup } from "@/modules/forms/form.lookup";
import { FormService } from "@/modules/forms/form.service";
import type { Mailer } from "@/modules/mail/mailer";
import { MeldingService } from "@/modules/meldingen/melding.service";
import { MeldingLifecycleService } from "@/modules/meldingen/meldingLifecycle.service";
import { ReclassificationService } from "@/modules/reclassification/reclassification.service";
import { JsonLogicRuleEvaluator } from "@/modules/rules/jsonLogic.evaluator";
import { TokenAuthority } from "@/modules/tokens/token.authority";

export interface ServiceDeps {
  store: Store;
  formCache: FormCache;
  mailer: Mailer;
  tokenTtlSeconds: number;
  classifier?: Classifier;
  addressResolver?: AddressResolver;
  now?: () => Date;
}

export interface Services {
  meldingen: MeldingService;
  lifecycle: MeldingLifecycleService;
  reclassification: ReclassificationService;
  answers: AnswerService;
  forms: FormService;
  classifications: ClassificationService;
  assetTypes: AssetTypeService;
  tokens: TokenAuthority;
}

export function createServices(deps: ServiceDeps): Services {
  const now = deps.now ?? (() => new Date());
  const { store, mailer } = deps;

  const rules = new JsonLogicRuleEvaluator();
  const tokens = new TokenAuthority({ ttlSeconds: deps.tokenTtlSeconds, now });
  const forms = new FormLookup(deps.formCache);

  const lifecycle = new MeldingLifecycleService({ store, tokens, forms, mailer, now });
  const reclassification = new ReclassificationService({ store, lifecycle, now });

  return {
    lifecycle,
    reclassification,
    tokens,
    meldingen: new MeldingService({
      store,
      rules,
      tokens,
      forms,
      classifier: deps.classifier ?? new KeywordClassifier(store),
      addressResolver: deps.addressResolver ?? new NullAddressResolver(),
      lifecycle,
      reclassification,
      now,
    }),
    answers: new AnswerService({
      store,
      tokens,
      forms,
      validator: new AnswerValidator(rules),
      now,
    }),
    forms: new FormService({ store, forms }),
    classifications: new ClassificationService(store, forms, now),
    assetTypes: new AssetTypeService(store, now),
  };
}
