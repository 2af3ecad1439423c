export {
  escapeHtml,
  renderPage,
  renderList,
  renderForm,
  renderErrorPage,
  type FlashCategory,
  type FlashMessage,
  type FormError,
  type FormPageOptions,
  type FormValues
} from './html-renderer.js';
export { buildPdfLayout, renderPdf, pdfTitle, type PdfBlock } from './pdf-renderer.js';
