import { AxiosHeaders, type AxiosResponse } from 'axios';

export function axiosResponse<T>(data: T, status = 200): AxiosResponse<T> {
  return {
    data,
    status,
    statusText: status === 200 ? 'OK' : 'ERROR',
    headers: {},
    config: { headers: new AxiosHeaders() },
  };
}
