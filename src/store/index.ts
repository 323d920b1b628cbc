import fs from 'fs/promises'
import path from 'path'
import { UnsafeImageTagError } from '../errors'

export interface IMetadataStore {
   // create the output directory (and its parents) if absent
   prepare(): Promise<void>
   pathFor(imageTag: string): string
   // overwrite the tag's metadata file with the raw output; returns its path
   write(imageTag: string, output: string): Promise<string>
}

export const METADATA_FILE_SUFFIX = '_metadata.json'

export function createMetadataStore(outputDir: string): IMetadataStore {
   const root = path.resolve(outputDir)

   const pathFor = (imageTag: string) => {
      const file = path.resolve(root, `${imageTag}${METADATA_FILE_SUFFIX}`)
      const rel = path.relative(root, file)
      // tags may hold '/', which nests the file below the output directory
      if (
         rel === '' ||
         rel === '..' ||
         rel.startsWith(`..${path.sep}`) ||
         path.isAbsolute(rel)
      ) {
         throw new UnsafeImageTagError(imageTag)
      }
      return file
   }

   return {
      async prepare() {
         await fs.mkdir(root, { recursive: true })
      },
      pathFor,
      async write(imageTag: string, output: string) {
         const file = pathFor(imageTag)
         await fs.mkdir(path.dirname(file), { recursive: true })
         await fs.writeFile(file, output, 'utf8')
         return file
      },
   }
}
