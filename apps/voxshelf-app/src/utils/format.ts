const pad = (value: number) => String(value).padStart(2, '0');

/** Local time as `YYYYMMDD_HHMMSS`, used in generated audio file names. */
export const formatFileTimestamp = (date: Date): string =>
  `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
  `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

export const shortHex = (uuid: string, length: number): string =>
  uuid.replace(/-/g, '').slice(0, length);
