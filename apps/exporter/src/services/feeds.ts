import axios, { AxiosInstance } from 'axios';
import { FetchError } from '../errors.js';
import { FeedName } from '../types/index.js';

export type FeedFetcher = (url: string, feed: FeedName) => Promise<string>;

const defaultClient = axios.create({
  responseType: 'text',
  headers: {
    'User-Agent': 'fuel-price-exporter/1.0',
    Accept: 'text/csv, text/plain, */*'
  }
});

export const fetchFeed = async (url: string, feed: FeedName, http: AxiosInstance = defaultClient): Promise<string> => {
  try {
    const response = await http.get<unknown>(url);
    if (typeof response.data !== 'string') {
      throw new Error(`Expected a text body, got ${typeof response.data}`);
    }
    return response.data;
  } catch (error) {
    if (axios.isAxiosError(error) && error.response) {
      throw new FetchError(feed, url, new Error(`HTTP ${error.response.status} ${error.response.statusText}`, { cause: error }));
    }
    throw new FetchError(feed, url, error);
  }
};
