/**
 * Known Google Workspace products
 *
 * Display metadata for the baselines the assessment tool ships. The catalog
 * itself is authoritative for which baselines exist; this only labels them.
 */

import type { ProductInfo } from './types.js';

export const KNOWN_PRODUCTS: readonly ProductInfo[] = [
  {
    name: 'COMMONCONTROLS',
    title: 'Common Controls',
    description: 'Tenant-wide controls for authentication, access control and session management',
  },
  {
    name: 'ASSUREDCONTROLS',
    title: 'Assured Controls',
    description: 'Data access approvals and data regions for Assured Controls licenses',
  },
  { name: 'GMAIL', title: 'Gmail', description: 'Email security controls for Gmail' },
  { name: 'DRIVE', title: 'Google Drive', description: 'File sharing and access controls for Drive and Docs' },
  { name: 'CALENDAR', title: 'Calendar', description: 'Calendar sharing and privacy settings' },
  { name: 'MEET', title: 'Google Meet', description: 'Video conferencing security and access controls' },
  { name: 'GROUPS', title: 'Groups', description: 'Google Groups configuration and permissions' },
  { name: 'CHAT', title: 'Google Chat', description: 'Chat and messaging security controls' },
  { name: 'SITES', title: 'Google Sites', description: 'Website creation and sharing controls' },
  { name: 'CLASSROOM', title: 'Classroom', description: 'Classroom security and privacy controls' },
];

/**
 * Look up display metadata (case-insensitive). Unknown products get a
 * title equal to their name so callers can always render something.
 */
export function getProductInfo(name: string): ProductInfo {
  const key = name.trim().toUpperCase();
  const known = KNOWN_PRODUCTS.find((product) => product.name === key);
  return known ?? { name: key, title: key, description: '' };
}
