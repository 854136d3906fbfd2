import type { HttpTransport } from '@domain/interfaces/IHttpTransport';

/** Production transport: Node's built-in fetch (undici). */
export const fetchTransport: HttpTransport = (url, init) => fetch(url, init);
