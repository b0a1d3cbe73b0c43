/**
 * HTTP client for the Sub-Store backend.
 *
 * Wraps a single axios instance: attaches the stored auth token to every
 * request and turns every failed response into a typed NetworkError.
 */

import axios, {
  type AxiosInstance,
  type AxiosRequestConfig,
  type InternalAxiosRequestConfig,
} from 'axios'
import { createNamedLogger } from '@substore/logger'
import { toNetworkError } from './errors'
import { tokenStorage as defaultTokenStorage, type TokenStorage } from './tokenStorage'

export const DEFAULT_BASE_URL = 'http://localhost:3000'
export const DEFAULT_TIMEOUT_MS = 30000

const log = createNamedLogger({ name: 'api-client' })

export interface ApiClientConfig {
  baseURL?: string
  /** Milliseconds; enforced by axios, not by callers */
  timeout?: number
  tokenStorage?: TokenStorage
}

export class ApiClient {
  private client: AxiosInstance
  private tokens: TokenStorage

  constructor(config: ApiClientConfig = {}) {
    this.tokens = config.tokenStorage ?? defaultTokenStorage
    this.client = axios.create({
      baseURL: config.baseURL ?? DEFAULT_BASE_URL,
      timeout: config.timeout ?? DEFAULT_TIMEOUT_MS,
      headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
    })

    this.client.interceptors.request.use(async (request: InternalAxiosRequestConfig) => {
      const token = await this.tokens.getAccessToken()
      if (token) {
        request.headers.Authorization = `Bearer ${token}`
      }
      log.debug(`${request.method?.toUpperCase() ?? 'GET'} ${request.url ?? ''}`)
      return request
    })

    this.client.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        const typed = toNetworkError(error)
        log.error(typed.message)
        return Promise.reject(typed)
      }
    )
  }

  getBaseURL(): string {
    return this.client.defaults.baseURL ?? DEFAULT_BASE_URL
  }

  setBaseURL(baseURL: string): void {
    this.client.defaults.baseURL = baseURL
  }

  async get<T>(url: string, config?: AxiosRequestConfig): Promise<T> {
    const response = await this.client.get<T>(url, config)
    return response.data
  }

  async post<T>(url: string, data?: unknown, config?: AxiosRequestConfig): Promise<T> {
    const response = await this.client.post<T>(url, data, config)
    return response.data
  }

  async put<T>(url: string, data?: unknown, config?: AxiosRequestConfig): Promise<T> {
    const response = await this.client.put<T>(url, data, config)
    return response.data
  }

  async patch<T>(url: string, data?: unknown, config?: AxiosRequestConfig): Promise<T> {
    const response = await this.client.patch<T>(url, data, config)
    return response.data
  }

  async delete<T>(url: string, config?: AxiosRequestConfig): Promise<T> {
    const response = await this.client.delete<T>(url, config)
    return response.data
  }
}
