export { BrowserSession, attempt, clickCaptchaCheckbox, downloadPdf, hasCaptchaWidget, toBrowserError } from './session.js';
export { ContasRioPortal } from './contas-rio-portal.js';
export { DowebGazette, searchUrl } from './doweb-gazette.js';
export { ProcessoRioDocuments, documentLinks } from './processo-documents.js';
export type { RawDocumentLink } from './processo-documents.js';
