import { type ValidateFunction } from 'ajv'
import { Ajv2020 } from 'ajv/dist/2020.js'

export const ajv = new Ajv2020({ allErrors: true, coerceTypes: false, strict: true })

ajv.addKeyword({
  keyword: 'function',
  validate (_: unknown, x: unknown) {
    return typeof x === 'function'
  },
  error: {
    message: 'must be function'
  }
})

export function formatValidationErrors (validator: ValidateFunction<unknown>, targetName: string): string {
  return ajv.errorsText(validator.errors, { dataVar: '$dataVar$' }).replaceAll('$dataVar$', targetName) + '.'
}
