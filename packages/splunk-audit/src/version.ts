// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export const PRODUCT_NAME = 'QueryAudit';
export const PRODUCT_VERSION = '0.1.0';

/** `<product>/<version>`, as sent in the `User-Agent` header. */
export function userAgent(product: string = PRODUCT_NAME, version: string = PRODUCT_VERSION): string {
  return `${product}/${version}`;
}
