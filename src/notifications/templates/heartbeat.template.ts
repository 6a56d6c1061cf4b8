import { price, stamp } from './format';

export interface PairPulse {
  pair: string;
  lastClose: number | null; // null when no provider had data
}

export const generateHeartbeatTemplate = (
  botName: string,
  pulses: PairPulse[],
  timestamp: string,
  timezone: string
): string => {
  const lines = [`❤️‍🔥 [${botName} HEARTBEAT]`];
  for (const pulse of pulses) {
    lines.push(
      pulse.lastClose === null
        ? `🔴 ${pulse.pair} | Candle Missing (fetch error)`
        : `✅ ${pulse.pair} | Last Close: ${price(pulse.lastClose)}`
    );
  }
  lines.push('', stamp(timestamp, timezone));
  return lines.join('\n');
};
