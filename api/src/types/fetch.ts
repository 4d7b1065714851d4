/** Injected into every outbound client so tests can stub the network. */
export type FetchFn = typeof fetch;
