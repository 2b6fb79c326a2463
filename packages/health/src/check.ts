import { err, ok, type Result } from 'neverthrow';

export const CheckStatus = {
  OK: 'OK',
  WARNING: 'WARNING',
  CRITICAL: 'CRITICAL',
} as const;

export type CheckStatus = (typeof CheckStatus)[keyof typeof CheckStatus];

/** Suffixes appended to a service name to describe its status */
export const StatusMessage: Record<CheckStatus, string> = {
  OK: ' is ok',
  WARNING: ' is degraded, but at least partially functioning',
  CRITICAL: ' functionality is unavailable or non-functioning',
};

export function statusMessage(service: string, status: CheckStatus): string {
  return `${service}${StatusMessage[status]}`;
}

export function isCheckStatus(value: unknown): value is CheckStatus {
  return value === CheckStatus.OK || value === CheckStatus.WARNING || value === CheckStatus.CRITICAL;
}

export interface Check {
  name: string;
  status: CheckStatus;
  statusCode: number;
  message: string;
  lastChecked: Date | undefined;
  lastSuccess: Date | undefined;
  lastFailure: Date | undefined;
}

export const HealthyMessage = 'service is OK';
export const WarningMessage = 'service is warming up or downgraded';
export const CriticalMessage = 'service is in critical state';
export const NotFoundMessage = 'received status code 404, unable to find health check endpoint';

const EPOCH = new Date(0);

/**
 * Build the check reported for a downstream service that exposes its own
 * health endpoint. Anything that is not OK or WARNING counts as critical.
 */
export function buildCheck(
  name: string,
  status: string,
  statusCode: number,
  errorMessage: string,
  now: Date = new Date()
): Check {
  const check: Check = {
    lastChecked: now,
    lastFailure: EPOCH,
    lastSuccess: EPOCH,
    message: '',
    name,
    status: CheckStatus.CRITICAL,
    statusCode,
  };

  if (status === CheckStatus.OK) {
    return { ...check, lastSuccess: now, message: HealthyMessage, status: CheckStatus.OK };
  }
  if (status === CheckStatus.WARNING) {
    return { ...check, lastFailure: now, message: WarningMessage, status: CheckStatus.WARNING };
  }

  let message = errorMessage;
  if (statusCode === 200) {
    message = CriticalMessage;
  } else if (statusCode === 404) {
    message = NotFoundMessage;
  }
  return { ...check, lastFailure: now, message };
}

/**
 * Latest result of a named check, updated by checkers and read by whoever
 * reports overall health.
 */
export class CheckState {
  private status: CheckStatus | undefined;
  private message = '';
  private statusCode = 0;
  private lastChecked: Date | undefined;
  private lastSuccess: Date | undefined;
  private lastFailure: Date | undefined;

  constructor(
    public readonly name: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  update(status: string, message: string, statusCode: number): Result<void, Error> {
    if (!isCheckStatus(status)) {
      return err(new Error(`invalid status: ${status}`));
    }

    const checkedAt = this.now();
    this.status = status;
    this.message = message;
    this.statusCode = statusCode;
    this.lastChecked = checkedAt;
    if (status === CheckStatus.OK) {
      this.lastSuccess = checkedAt;
    } else {
      this.lastFailure = checkedAt;
    }
    return ok();
  }

  /** Undefined until the first update */
  snapshot(): Check | undefined {
    if (this.status === undefined) {
      return undefined;
    }
    return {
      lastChecked: this.lastChecked,
      lastFailure: this.lastFailure,
      lastSuccess: this.lastSuccess,
      message: this.message,
      name: this.name,
      status: this.status,
      statusCode: this.statusCode,
    };
  }
}
