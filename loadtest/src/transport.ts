import axios, { type AxiosInstance } from 'axios';
import type { Readable } from 'stream';
import type { HttpMethod } from './types';

export interface OutgoingRequest {
  method: HttpMethod;
  url: string;
  body?: Buffer;
  headers?: Record<string, string>;
}

/** A received response whose body has not been read yet. */
export interface TransportResponse {
  status: number;
  /** Reads the body to the end and resolves to its size in bytes. */
  drain(): Promise<number>;
  /** Frees the underlying connection. Safe to call after drain(). */
  release(): void;
}

export interface HttpTransport {
  send(request: OutgoingRequest): Promise<TransportResponse>;
}

export const countStreamBytes = async (stream: AsyncIterable<unknown>): Promise<number> => {
  let bytes = 0;
  for await (const chunk of stream) {
    if (typeof chunk === 'string') {
      bytes += Buffer.byteLength(chunk);
    } else if (chunk instanceof Uint8Array) {
      bytes += chunk.byteLength;
    }
  }
  return bytes;
};

export class AxiosTransport implements HttpTransport {
  private client: AxiosInstance;

  constructor(timeout: number, client?: AxiosInstance) {
    this.client = client || axios.create({
      timeout,
      // Non-2xx statuses are classified by the caller, not thrown by axios
      validateStatus: () => true,
      maxRedirects: 0,
      responseType: 'stream',
      // Keep the serialized body byte-for-byte as given
      transformRequest: [(data: unknown) => data]
    });
  }

  async send(request: OutgoingRequest): Promise<TransportResponse> {
    const response = await this.client.request<Readable>({
      method: request.method,
      url: request.url,
      data: request.body,
      headers: request.headers
    });
    const stream = response.data;

    return {
      status: response.status,
      drain: () => countStreamBytes(stream),
      release: () => {
        if (!stream.destroyed) {
          stream.destroy();
        }
      }
    };
  }
}
