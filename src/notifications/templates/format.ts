export const price = (value: number) => value.toFixed(5);

export const money = (value: number) => (value < 0 ? `-$${Math.abs(value).toFixed(2)}` : `$${value.toFixed(2)}`);

export const signedMoney = (value: number) => (value < 0 ? money(value) : `+${money(value)}`);

export const lot = (value: number) => value.toFixed(2);

export const stamp = (timestamp: string, timezone: string) => `🕒 ${timestamp} (${timezone})`;
