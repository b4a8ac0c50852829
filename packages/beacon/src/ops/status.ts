export type StatusName = 'active' | 'blocked' | 'waiting' | 'maintenance' | 'unknown';

export interface Status {
  name: StatusName;
  message: string;
}

export const Status = {
  active: (message = ''): Status => ({ name: 'active', message }),
  blocked: (message: string): Status => ({ name: 'blocked', message }),
  waiting: (message: string): Status => ({ name: 'waiting', message }),
  maintenance: (message: string): Status => ({ name: 'maintenance', message }),
  unknown: (): Status => ({ name: 'unknown', message: '' }),
};
