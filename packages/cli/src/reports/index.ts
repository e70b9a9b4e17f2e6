export * from './table-document.js'
export * from './palette.js'
export * from './statistics-report.js'
export * from './changes-report.js'
