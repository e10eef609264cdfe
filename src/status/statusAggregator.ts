import {
  AggregatedStatus,
  MasterStatus,
  StatusLabel,
  StatusSeverity,
  ZoneStatus
} from '../types/panel';

export interface LabelInputs {
  resetting: boolean;
  loading: boolean;
  master: MasterStatus | null;
  persistedTrouble: boolean;
  alarmZoneCount: number;
  lastTelegramAt: number | null;
  configuredZones: number;
  noDataTimeoutMs: number;
  now: number;
}

export interface ZoneCounts {
  alarm: number;
  trouble: number;
  active: number;
  normal: number;
  total: number;
}

const LABEL_STYLE: Record<StatusLabel, { severity: StatusSeverity; color: string }> = {
  [StatusLabel.SYSTEM_RESETTING]: { severity: StatusSeverity.INFO, color: 'white' },
  [StatusLabel.LOADING]: { severity: StatusSeverity.INFO, color: 'blue' },
  [StatusLabel.ALARM_DRILL]: { severity: StatusSeverity.CRITICAL, color: 'red' },
  [StatusLabel.ALARM]: { severity: StatusSeverity.CRITICAL, color: 'red' },
  [StatusLabel.SYSTEM_TROUBLE]: { severity: StatusSeverity.HIGH, color: 'orange' },
  [StatusLabel.SYSTEM_SILENCED]: { severity: StatusSeverity.MEDIUM, color: 'yellow' },
  [StatusLabel.SYSTEM_DISABLED]: { severity: StatusSeverity.MEDIUM, color: 'yellow' },
  [StatusLabel.NO_DATA]: { severity: StatusSeverity.UNKNOWN, color: 'grey' },
  [StatusLabel.SYSTEM_NORMAL]: { severity: StatusSeverity.LOW, color: 'green' },
  [StatusLabel.SYSTEM_ERROR]: { severity: StatusSeverity.CRITICAL, color: 'red' }
};

export class StatusAggregator {
  static describe(label: StatusLabel): AggregatedStatus {
    const style = LABEL_STYLE[label];
    return { text: label, severity: style.severity, color: style.color };
  }

  // Highest priority first
  static computeLabel(inputs: LabelInputs): StatusLabel {
    const { master } = inputs;

    if (inputs.resetting) return StatusLabel.SYSTEM_RESETTING;
    if (inputs.loading) return StatusLabel.LOADING;
    if (master?.drill) return StatusLabel.ALARM_DRILL;
    if (master?.alarm || inputs.alarmZoneCount > 0) return StatusLabel.ALARM;
    if (inputs.persistedTrouble) return StatusLabel.SYSTEM_TROUBLE;
    if (master?.silenced) return StatusLabel.SYSTEM_SILENCED;
    if (master?.disabled) return StatusLabel.SYSTEM_DISABLED;
    if (this.isNoData(inputs)) return StatusLabel.NO_DATA;
    return StatusLabel.SYSTEM_NORMAL;
  }

  static aggregate(compute: () => LabelInputs): AggregatedStatus {
    try {
      return this.describe(this.computeLabel(compute()));
    } catch (error) {
      console.error('[STATUS] Label computation failed:', error);
      return this.describe(StatusLabel.SYSTEM_ERROR);
    }
  }

  static countZones(zones: ZoneStatus[]): ZoneCounts {
    const counts: ZoneCounts = { alarm: 0, trouble: 0, active: 0, normal: 0, total: zones.length };
    for (const zone of zones) {
      if (zone.hasAlarm) counts.alarm++;
      if (zone.hasTrouble) counts.trouble++;
      if (zone.isActive) counts.active++;
      if (!zone.hasAlarm && !zone.hasTrouble && !zone.isActive) counts.normal++;
    }
    return counts;
  }

  private static isNoData(inputs: LabelInputs): boolean {
    if (inputs.configuredZones <= 0 || inputs.master === null) return true;
    if (inputs.lastTelegramAt === null) return true;
    return inputs.now - inputs.lastTelegramAt >= inputs.noDataTimeoutMs;
  }
}
