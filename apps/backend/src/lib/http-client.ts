import axios from 'axios';
import { env } from '../config/env.js';

export const httpClient = axios.create({
  timeout: env.PLUGINS_DOWNLOAD_TIMEOUT_MS,
  headers: {
    'User-Agent': 'PluginCatalog/1.0'
  }
});

httpClient.interceptors.response.use(
  response => response,
  error => {
    if (axios.isAxiosError(error) && error.response) {
      error.message = `HTTP ${error.response.status}: ${error.response.statusText}`;
    }
    return Promise.reject(error);
  }
);
