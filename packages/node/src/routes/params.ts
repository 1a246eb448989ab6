/**
 * Path parameter parsing shared by the read routes.
 */

import type { Address } from "@wtoken/types";
import { AddressSchema } from "../types/dto.js";
import { ApiError } from "../types/error.js";

export function addressParam(name: string, value: string): Address {
  const result = AddressSchema.safeParse(value);
  if (!result.success) {
    throw new ApiError("VALIDATION_ERROR", 400, `Path parameter '${name}' is not an address`, {
      [name]: value,
    });
  }
  return result.data;
}
