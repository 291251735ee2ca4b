export const sharedFlags = {
  file: {
    type: String,
    alias: 'f',
    description: 'Path to the CDB file',
    default: './data.cdb'
  }
}
