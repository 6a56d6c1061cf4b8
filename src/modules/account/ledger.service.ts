export interface AccountSettings {
  startingCapital: number;
  riskPercent: number;
  riskRewardRatio: number;
}

export interface PeriodStats {
  wins: number;
  losses: number;
  netProfit: number;
}

export interface AccountSnapshot extends AccountSettings, PeriodStats {
  currentCapital: number;
}

export interface PositionRisk {
  riskAmount: number;
  rewardAmount: number;
}

const round2 = (value: number) => Math.round(value * 100) / 100;

/**
 * Simulated account balance under a fixed risk-per-trade model.
 *
 * Every mutation is synchronous, so on the event loop a reader sees either the
 * state before an update or after it, never in between. Capital is not floored
 * and lives only as long as the process.
 */
export class LedgerService {
  private readonly settings: AccountSettings;
  private currentCapital: number;
  private stats: PeriodStats = { wins: 0, losses: 0, netProfit: 0 };

  constructor(settings: AccountSettings) {
    this.settings = { ...settings };
    this.currentCapital = settings.startingCapital;
  }

  get capital(): number {
    return this.currentCapital;
  }

  positionRisk(): PositionRisk {
    const riskAmount = round2(this.currentCapital * (this.settings.riskPercent / 100));
    const rewardAmount = round2(riskAmount * this.settings.riskRewardRatio);
    return { riskAmount, rewardAmount };
  }

  applyOutcome(won: boolean, riskAmount: number, rewardAmount: number): number {
    if (won) {
      this.currentCapital += rewardAmount;
      this.stats.wins += 1;
      this.stats.netProfit += rewardAmount;
    } else {
      this.currentCapital -= riskAmount;
      this.stats.losses += 1;
      this.stats.netProfit -= riskAmount;
    }
    return this.currentCapital;
  }

  periodStats(): PeriodStats {
    return { ...this.stats };
  }

  // Restores the starting capital and clears the period stats
  reset(): number {
    this.currentCapital = this.settings.startingCapital;
    this.stats = { wins: 0, losses: 0, netProfit: 0 };
    return this.currentCapital;
  }

  snapshot(): AccountSnapshot {
    return {
      ...this.settings,
      ...this.stats,
      currentCapital: this.currentCapital,
    };
  }
}
