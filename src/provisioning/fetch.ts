import fetch from "node-fetch"

/**
 * The part of a fetch response the provisioning code reads.
 */
export interface FetchResponse {
  readonly ok: boolean
  readonly status: number
  readonly statusText: string

  /**
   * Final URL, after redirects were followed.
   */
  readonly url: string
  readonly body: NodeJS.ReadableStream | null
  text(): Promise<string>
}

export interface FetchInit {
  method?: string
  redirect?: "follow" | "manual"
}

export type FetchFn = (url: string, init?: FetchInit) => Promise<FetchResponse>

export const nodeFetch: FetchFn = fetch
