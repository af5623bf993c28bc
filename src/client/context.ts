import type { Requestor } from './requestor'

/**
 * Handle an Account passes to every Test and Report it creates
 */
export interface ClientContext {
  readonly requestor: Requestor
  /** Default wait between status polls, in ms */
  readonly pollInterval: number
}
