const pad = (value: number, width: number = 2): string => String(value).padStart(width, '0');

const TOKENS: Record<string, (date: Date) => string> = {
  Y: (date) => pad(date.getFullYear(), 4),
  y: (date) => pad(date.getFullYear() % 100),
  m: (date) => pad(date.getMonth() + 1),
  d: (date) => pad(date.getDate()),
  H: (date) => pad(date.getHours()),
  M: (date) => pad(date.getMinutes()),
  S: (date) => pad(date.getSeconds()),
  '%': () => '%',
};

/**
 * strftime subset (%Y %y %m %d %H %M %S %%) in local time.
 * Unknown directives are kept as written.
 */
export function formatDate(date: Date, format: string): string {
  return format.replace(/%(.)/g, (directive: string, token: string) => {
    const render = TOKENS[token];
    return render ? render(date) : directive;
  });
}
