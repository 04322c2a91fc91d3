export interface JwtHeader {
  alg: string
  typ: 'JWT'
  kid?: string
}
