import { promises as fs } from 'fs'
import os from 'os'
import path from 'path'
import { isCandidateImage, listDatedFolders, listPhasePhotos, removeStampedOutputs } from '@/lib/files/listing'
import { ConfigError } from '@/lib/errors'

describe('Photo listing', () => {
  let root: string

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'photo-stamp-listing-'))
    jest.spyOn(console, 'log').mockImplementation(() => {})
  })

  afterEach(async () => {
    jest.restoreAllMocks()
    await fs.rm(root, { recursive: true, force: true })
  })

  const touch = async (...segments: string[]) => {
    const file = path.join(root, ...segments)
    await fs.mkdir(path.dirname(file), { recursive: true })
    await fs.writeFile(file, 'x')
    return file
  }

  test('recognises image extensions case-insensitively', () => {
    expect(isCandidateImage('1_IMG.JPG')).toBe(true)
    expect(isCandidateImage('scan.jpeg')).toBe(true)
    expect(isCandidateImage('plan.png')).toBe(true)
    expect(isCandidateImage('notes.txt')).toBe(false)
    expect(isCandidateImage('1_IMG_stamped.png')).toBe(false)
  })

  test('lists only top-level images of the phase folder', async () => {
    await touch('works', '1_a.jpg')
    await touch('works', '1_b.PNG')
    await touch('works', '1_a_stamped.png')
    await touch('works', 'readme.txt')
    await touch('works', 'nested', '2_c.jpg')

    const photos = await listPhasePhotos(root, 'works')
    const names = photos.map(photo => photo.fileName).sort()

    expect(names).toEqual(['1_a.jpg', '1_b.PNG'])
    expect(photos.find(photo => photo.fileName === '1_a.jpg')?.path).toBe(path.join(root, 'works', '1_a.jpg'))
  })

  test('reports a missing phase folder as a configuration error', async () => {
    const error = await listPhasePhotos(root, 'cleanup').catch((err: unknown) => err)

    expect(error).toBeInstanceOf(ConfigError)
    expect(error).toMatchObject({ phase: 'cleanup', key: 'folderPath' })
  })

  test('removes stamped outputs from every phase folder', async () => {
    const kept = await touch('works', '1_a.jpg')
    const first = await touch('works', '1_a_stamped.png')
    const second = await touch('pre-work', 'deep', '3_x_stamped.png')

    const removed = await removeStampedOutputs(root)

    expect(removed.sort()).toEqual([first, second].sort())
    await expect(fs.access(kept)).resolves.toBeUndefined()
    await expect(fs.access(first)).rejects.toThrow()
  })

  test('reports a missing photo folder as a configuration error when cleaning up', async () => {
    const missing = path.join(root, 'no-such-folder')

    const error = await removeStampedOutputs(missing).catch((err: unknown) => err)

    expect(error).toBeInstanceOf(ConfigError)
    expect(error).toMatchObject({ key: 'folderPath', message: `Photo folder not found: ${missing}` })
  })

  test('lists dated subfolders oldest first and skips the rest', async () => {
    await touch('02.01.2025 Feeder', 'works', '1.jpg')
    await touch('31.12.2024', 'works', '1.jpg')
    await touch('archive', 'old.jpg')
    await touch('10.10.2024.txt')

    const { folders, skipped } = await listDatedFolders(root)

    expect(folders).toEqual([
      { name: '31.12.2024', path: path.join(root, '31.12.2024'), date: { year: 2024, month: 12, day: 31 } },
      { name: '02.01.2025 Feeder', path: path.join(root, '02.01.2025 Feeder'), date: { year: 2025, month: 1, day: 2 } }
    ])
    expect(skipped).toEqual(['archive'])
  })
})
