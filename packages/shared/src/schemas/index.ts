export {
  generateFieldsSchema,
  uploadLimits,
  type GenerateFields,
} from './generate'

export { downloadParams } from './download'
