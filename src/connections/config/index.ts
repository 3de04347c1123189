export { appConfig, paginationConfig, loggingConfig } from './app.config';
export { dbConfig } from './database.config';
