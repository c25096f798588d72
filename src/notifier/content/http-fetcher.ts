import axios from 'axios';

export type TextFetcher = (locator: string, options: { timeout: number }) => Promise<string>;

/**
 * GET the locator and return the body as text
 */
export const httpTextFetcher: TextFetcher = async (locator, { timeout }) => {
  const response = await axios.get<unknown>(locator, {
    timeout,
    responseType: 'text',
    transformResponse: [(data: unknown) => data]
  });

  const { data } = response;
  if (typeof data === 'string') {
    return data;
  }
  return JSON.stringify(data, null, 2);
};
