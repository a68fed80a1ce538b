import type {DNSProviderFactory} from '../dns-provider.js';

import {CloudflareDNSProvider} from './cloudflare-dns-provider.js';

export const createDNSProvider: DNSProviderFactory = options =>
  new CloudflareDNSProvider(options);

export * from './cloudflare-dns-provider.js';
