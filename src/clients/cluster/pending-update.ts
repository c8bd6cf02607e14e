import { MultipleErrors, UserError } from '../../errors.ts'
import { type Callback } from '../callbacks.ts'
import { type PendingUpdateState } from './types.ts'

type Settled<ReturnType> = { state: 'fulfilled', value: ReturnType } | { state: 'rejected', error: Error }

type Outcome<ReturnType> = { state: 'pending' } | Settled<ReturnType>

type Observer<ReturnType> = (outcome: Settled<ReturnType>) => void

/*
  A one-shot result shared by everyone waiting for the same metadata refresh.

  It settles exactly once, either with a value or with an error. Subscribers registered before
  settlement are invoked in registration order when it happens, later ones are invoked immediately.
  A subscriber which throws does not prevent the others from being invoked.
*/
export class PendingUpdate<ReturnType> {
  #outcome: Outcome<ReturnType>
  #observers: Observer<ReturnType>[]
  #promise: Promise<ReturnType> | undefined

  constructor () {
    this.#outcome = { state: 'pending' }
    this.#observers = []
  }

  get state (): PendingUpdateState {
    return this.#outcome.state
  }

  get resolved (): boolean {
    return this.#outcome.state !== 'pending'
  }

  get value (): ReturnType | undefined {
    const outcome = this.#outcome
    return outcome.state === 'fulfilled' ? outcome.value : undefined
  }

  get error (): Error | undefined {
    const outcome = this.#outcome
    return outcome.state === 'rejected' ? outcome.error : undefined
  }

  // Created on first access only, so an update nobody awaits never rejects a promise
  get promise (): Promise<ReturnType> {
    if (!this.#promise) {
      this.#promise = new Promise<ReturnType>((resolve, reject) => {
        this.#observe(outcome => {
          if (outcome.state === 'fulfilled') {
            resolve(outcome.value)
          } else {
            reject(outcome.error)
          }
        })
      })
    }

    return this.#promise
  }

  resolve (value: ReturnType): void {
    this.#settle({ state: 'fulfilled', value })
  }

  reject (error: Error): void {
    this.#settle({ state: 'rejected', error })
  }

  onResolved (callback: Callback<ReturnType>): void {
    this.#observe(outcome => {
      if (outcome.state === 'fulfilled') {
        callback(null, outcome.value)
      } else {
        callback(outcome.error)
      }
    })
  }

  #observe (observer: Observer<ReturnType>): void {
    const outcome = this.#outcome

    if (outcome.state === 'pending') {
      this.#observers.push(observer)
      return
    }

    observer(outcome)
  }

  #settle (outcome: Settled<ReturnType>): void {
    const current = this.#outcome

    if (current.state !== 'pending') {
      const operation = outcome.state === 'fulfilled' ? 'resolve' : 'reject'
      throw new UserError(`Cannot ${operation} a pending update which is already ${current.state}.`, {
        state: current.state
      })
    }

    this.#outcome = outcome

    const observers = this.#observers
    this.#observers = []
    const errors: Error[] = []

    for (const observer of observers) {
      try {
        observer(outcome)
      } catch (error) {
        errors.push(error instanceof Error ? error : new Error(String(error)))
      }
    }

    if (errors.length) {
      throw new MultipleErrors(`${errors.length} pending update callback(s) failed.`, errors, { state: outcome.state })
    }
  }
}
