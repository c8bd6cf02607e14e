export type Callback<ReturnType> = (error: Error | null, payload?: ReturnType) => void

export const kCallbackPromise = Symbol('kafka.metadata.callbackPromise')

export type CallbackWithPromise<ReturnType> = Callback<ReturnType> & { [kCallbackPromise]?: Promise<ReturnType> }

export function createPromisifiedCallback<ReturnType> (): CallbackWithPromise<ReturnType> {
  let resolve: (value: ReturnType) => void = () => {}
  let reject: (error: Error) => void = () => {}

  const promise = new Promise<ReturnType>((res, rej) => {
    resolve = res
    reject = rej
  })

  function callback (error: Error | null, payload?: ReturnType): void {
    if (error) {
      reject(error)
    } else {
      resolve(payload!)
    }
  }

  callback[kCallbackPromise] = promise

  return callback
}
