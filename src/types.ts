export interface PackageJson {
  name: string
  version: string
  description: string
}
