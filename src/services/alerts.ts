import { EventEmitter } from 'eventemitter3'

export type OperationalAlert =
  | { kind: 'auth_failure'; component: string; message: string; at: number }
  | { kind: 'ledger_unavailable'; component: string; message: string; at: number }

interface AlertEvents {
  alert: [OperationalAlert]
}

/**
 * Channel for conditions an operator has to act on, such as a rejected
 * platform credential. Subscribers decide how to page; publishers never wait.
 */
export class AlertChannel extends EventEmitter<AlertEvents> {
  publish(alert: OperationalAlert): void {
    this.emit('alert', alert)
  }

  subscribe(listener: (alert: OperationalAlert) => void): () => void {
    this.on('alert', listener)
    return () => {
      this.off('alert', listener)
    }
  }
}
