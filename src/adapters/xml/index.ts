export {
  KMyMoneyXmlReader,
  type KMyMoneyXmlReaderOptions,
  parseKMyMoneyXml,
  decodeDocument,
  stripControlCharacters
} from './kmymoney-xml-reader.js'
