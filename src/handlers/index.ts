// Export all handlers from their respective files
export * from './docx-handlers.js';
