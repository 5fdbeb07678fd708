export interface TransactionHeader {
  date: string
  id: string
  payee: string
  memo: string
}

export interface PostingLine {
  account: string
  commodity: string
  amount: string
  payee: string
  memo: string
}

export interface AccountTag {
  name: string
  value: string
}

export interface AccountDeclaration {
  path: string
  displayPath: string
  tags: AccountTag[]
}

export interface CommentLine {
  text: string
  // Rendered tab-indented under the preceding line
  nested?: boolean
}

export interface CommentBlock {
  title: string
  lines: CommentLine[]
}
