// src/modules/address/address.resolver.ts

import type { MeldingAddress } from "@/modules/meldingen/melding.types";

/** Reverse geocoding seam; consulted after a location is stored. */
export interface AddressResolver {
  resolve(lat: number, lng: number): Promise<MeldingAddress | null>;
}

export class NullAddressResolver implements AddressResolver {
  async resolve(): Promise<MeldingAddress | null> {
    return null;
  }
}
