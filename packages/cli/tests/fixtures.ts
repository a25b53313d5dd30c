import { freezeCatalog, type BaselineCatalog } from '@gws-config/extractor';
import { createEmptyDocument, type ConfigurationDocument } from '../src/document/model.js';

export const TEST_CATALOG: BaselineCatalog = freezeCatalog({
  GMAIL: [
    { policyId: 'GWS.GMAIL.1.1v0.6', title: 'Mail delegation', description: 'Mail delegation SHOULD be disabled.' },
    { policyId: 'GWS.GMAIL.2.1v0.6', title: 'DKIM signing', description: 'DKIM SHOULD be enabled.' },
  ],
  DRIVE: [{ policyId: 'GWS.DRIVE.1.1v0.6', title: 'External sharing', description: 'Sharing SHALL be limited.' }],
});

/** A valid document touching every section */
export function fullDocument(): ConfigurationDocument {
  return {
    ...createEmptyDocument(),
    organization: { name: 'Acme', unit: 'Finance' },
    products: ['DRIVE', 'GMAIL'],
    omissions: {
      'GWS.GMAIL.1.1v0.6': {
        policyId: 'GWS.GMAIL.1.1v0.6',
        rationale: 'Handled by gateway',
        expiration: '2026-12-31',
      },
    },
    annotations: {
      'GWS.DRIVE.1.1v0.6': {
        policyId: 'GWS.DRIVE.1.1v0.6',
        comment: 'Known gap',
        incorrect: true,
      },
    },
    breakGlassAccounts: ['admin@example.org'],
    output: { directory: './reports', formats: ['html', 'json'], quiet: false, darkMode: true },
    auth: {
      mode: 'service-account',
      credentials: './sa.json',
      customerId: 'C0test',
      subjectEmail: 'admin@example.org',
    },
  };
}
