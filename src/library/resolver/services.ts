import type {AddressFamily} from '../dns/index.js';

/**
 * Address-echo services answering with the caller's public address as plain
 * text.
 */
export const PUBLIC_IP_SERVICES_DEFAULT: Record<AddressFamily, string[]> = {
  ipv4: [
    'https://api.ipify.org',
    'https://ipv4.icanhazip.com',
    'https://v4.ident.me',
  ],
  ipv6: [
    'https://api6.ipify.org',
    'https://ipv6.icanhazip.com',
    'https://v6.ident.me',
  ],
};
