import fs from 'fs/promises';
import path from 'path';
import { HttpClient, HttpMethod, HttpResponse } from '../../src/services/http.js';

export interface RecordedRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string | object;
}

export interface RecordedDownload {
  url: string;
  headers: Record<string, string>;
  destination: string;
}

type Responder = HttpResponse | ((request: RecordedRequest) => HttpResponse | Promise<HttpResponse>);
type DownloadResponder = (download: RecordedDownload) => Promise<void>;

interface Route {
  method: HttpMethod;
  urlSuffix: string;
  responders: Responder[];
}

export function json(status: number, data: unknown): HttpResponse {
  return { status, body: Buffer.from(JSON.stringify(data)) };
}

export function text(status: number, body: string): HttpResponse {
  return { status, body: Buffer.from(body) };
}

/**
 * In-process HttpClient. Each route answers with its responders in order
 * and repeats the last one once the list is exhausted.
 */
export class FakeHttpClient implements HttpClient {
  requests: RecordedRequest[] = [];
  downloads: RecordedDownload[] = [];
  private routes: Route[] = [];
  private downloadResponders: DownloadResponder[] = [];

  on(method: HttpMethod, urlSuffix: string, ...responders: Responder[]): this {
    this.routes.push({ method, urlSuffix, responders });
    return this;
  }

  onDownload(...responders: DownloadResponder[]): this {
    this.downloadResponders = responders;
    return this;
  }

  requestsTo(urlSuffix: string): RecordedRequest[] {
    return this.requests.filter(request => request.url.endsWith(urlSuffix));
  }

  async request(
    method: HttpMethod,
    url: string,
    headers: Record<string, string>,
    body?: string | object
  ): Promise<HttpResponse> {
    const request: RecordedRequest = { method, url, headers, body };
    this.requests.push(request);

    const route = this.routes.find(candidate => candidate.method === method && url.endsWith(candidate.urlSuffix));
    if (!route || route.responders.length === 0) {
      return text(404, 'not found');
    }
    const responder = route.responders.length > 1 ? route.responders.shift() : route.responders[0];
    if (responder === undefined) {
      return text(404, 'not found');
    }
    return typeof responder === 'function' ? responder(request) : responder;
  }

  async download(url: string, headers: Record<string, string>, destination: string): Promise<void> {
    const download: RecordedDownload = { url, headers, destination };
    this.downloads.push(download);

    const responder = this.downloadResponders.length > 1
      ? this.downloadResponders.shift()
      : this.downloadResponders[0];
    if (responder) {
      await responder(download);
      return;
    }
    await fs.mkdir(path.dirname(destination), { recursive: true });
    await fs.writeFile(destination, Buffer.from('fake-jpeg-bytes'));
  }
}
