/**
 * Errors raised while loading the export and fetching metadata.
 */

export class ExportFileNotFoundError extends Error {
   file: string

   constructor(file: string) {
      super(`Export file not found: ${file}`)
      this.name = 'ExportFileNotFoundError'
      this.file = file
   }
}

export class InvalidExportError extends Error {
   file: string

   constructor(file: string, message: string) {
      super(`Invalid export file ${file}: ${message}`)
      this.name = 'InvalidExportError'
      this.file = file
   }
}

export class InvalidConfigError extends Error {
   constructor(message: string) {
      super(`Invalid configuration: ${message}`)
      this.name = 'InvalidConfigError'
   }
}

export class UnsafeImageTagError extends Error {
   imageTag: string

   constructor(imageTag: string) {
      super(`Image tag resolves outside the output directory: ${imageTag}`)
      this.name = 'UnsafeImageTagError'
      this.imageTag = imageTag
   }
}

export class FetchAbortedError extends Error {
   constructor() {
      super('Fetch aborted')
      this.name = 'FetchAbortedError'
   }
}
