/**
 * REST endpoint locations for a dealing platform.
 */

import { PLATFORM_URLS, parsePlatform, type Platform } from "../../config/index.js";

export class ApiEndpoints {
  readonly platform: Platform;
  readonly baseUrl: string;

  constructor(platform: string = "live") {
    this.platform = parsePlatform(platform);
    this.baseUrl = PLATFORM_URLS[this.platform];
  }

  get sessionUrl(): string {
    return `${this.baseUrl}/session`;
  }

  get accountsUrl(): string {
    return `${this.baseUrl}/accounts`;
  }

  get positionsUrl(): string {
    return `${this.baseUrl}/positions`;
  }

  /** OTC dealing: open (POST) and close (DELETE) */
  get otcPositionsUrl(): string {
    return `${this.positionsUrl}/otc`;
  }

  get marketsUrl(): string {
    return `${this.baseUrl}/markets`;
  }

  positionUrl(dealId: string): string {
    return `${this.positionsUrl}/${encodeURIComponent(dealId)}`;
  }

  marketUrl(epic: string): string {
    return `${this.marketsUrl}/${encodeURIComponent(epic)}`;
  }

  pricesUrl(epic: string): string {
    return `${this.baseUrl}/prices/${encodeURIComponent(epic)}`;
  }

  confirmUrl(dealReference: string): string {
    return `${this.baseUrl}/confirms/${encodeURIComponent(dealReference)}`;
  }
}
