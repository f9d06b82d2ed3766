import { createStampRecords, dispatchStamps, type StampRenderer } from '@/lib/stamp/dispatchStamps'
import { formatTimestamp } from '@/lib/stamp/formatTimestamp'
import { createClock } from '@/lib/time/clock'
import type { PhotoRef, TimedPhoto } from '@/lib/types'
import { createSeededRandom } from '@/lib/utils/random'

const march14 = { year: 2025, month: 3, day: 14 }

const timedPhoto = (fileName: string, seconds: number): TimedPhoto => ({
  photo: { path: `/photos/works/${fileName}`, fileName },
  phase: 'works',
  groupKey: '',
  clock: createClock(march14, seconds)
})

const recordingRenderer = () => {
  const calls: Array<{ fileName: string; text: string; location: string }> = []
  const renderer: StampRenderer = {
    async render(photo: PhotoRef, text: string, location: string) {
      calls.push({ fileName: photo.fileName, text, location })
    }
  }
  return { renderer, calls }
}

describe('formatTimestamp', () => {
  test('uses abbreviated Russian months with the year suffix', () => {
    const clock = createClock(march14, 8 * 3600 + 5 * 60 + 9.7)

    expect(formatTimestamp(clock, 'ru')).toBe('14 мар. 2025 г. 08:05:09')
  })

  test('supports an English rule', () => {
    const clock = createClock(march14, 8 * 3600 + 5 * 60 + 9)

    expect(formatTimestamp(clock, 'en')).toBe('14 Mar. 2025 08:05:09')
  })

  test('pads the day and midnight', () => {
    expect(formatTimestamp(createClock({ year: 2025, month: 1, day: 5 }, 0))).toBe('05 янв. 2025 г. 00:00:00')
  })
})

describe('createStampRecords', () => {
  test('draws locations uniformly from the list', () => {
    const timed = [timedPhoto('a.jpg', 0), timedPhoto('b.jpg', 10)]

    expect(createStampRecords(timed, ['North gate', 'Pump house'], () => 0).map(r => r.location))
      .toEqual(['North gate', 'North gate'])
    expect(createStampRecords(timed, ['North gate', 'Pump house'], () => 0.99).map(r => r.location))
      .toEqual(['Pump house', 'Pump house'])
  })

  test('is reproducible for the same seed', () => {
    const timed = Array.from({ length: 12 }, (_, index) => timedPhoto(`${index}.jpg`, index * 60))
    const locations = ['A', 'B', 'C', 'D']

    const first = createStampRecords(timed, locations, createSeededRandom(42)).map(r => r.location)
    const second = createStampRecords(timed, locations, createSeededRandom(42)).map(r => r.location)

    expect(second).toEqual(first)
  })

  test('freezes each record', () => {
    const [record] = createStampRecords([timedPhoto('a.jpg', 0)], ['Site'], () => 0)

    expect(Object.isFrozen(record)).toBe(true)
  })
})

describe('dispatchStamps', () => {
  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined)
  })

  afterEach(() => {
    jest.restoreAllMocks()
  })

  test('hands every photo to the renderer with its text and location', async () => {
    const { renderer, calls } = recordingRenderer()

    const result = await dispatchStamps([timedPhoto('a.jpg', 28800), timedPhoto('b.jpg', 28860)], {
      locations: ['Substation 4\nFeeder bay 2'],
      random: () => 0.5,
      renderer,
      locale: 'en'
    })

    expect(calls).toEqual([
      { fileName: 'a.jpg', text: '14 Mar. 2025 08:00:00', location: 'Substation 4\nFeeder bay 2' },
      { fileName: 'b.jpg', text: '14 Mar. 2025 08:01:00', location: 'Substation 4\nFeeder bay 2' }
    ])
    expect(result.stamped).toHaveLength(2)
    expect(result.failed).toEqual([])
  })

  test('reports a render failure and keeps going', async () => {
    const rendered: string[] = []
    const renderer: StampRenderer = {
      async render(photo) {
        if (photo.fileName === 'b.jpg') {
          throw new Error('disk full')
        }
        rendered.push(photo.fileName)
      }
    }

    const result = await dispatchStamps(
      [timedPhoto('a.jpg', 0), timedPhoto('b.jpg', 60), timedPhoto('c.jpg', 120)],
      { locations: ['Site'], random: () => 0, renderer, concurrency: 1 }
    )

    expect(rendered).toEqual(['a.jpg', 'c.jpg'])
    expect(result.records).toHaveLength(3)
    expect(result.stamped.map(record => record.photo.fileName)).toEqual(['a.jpg', 'c.jpg'])
    expect(result.failed).toEqual([
      { fileName: 'b.jpg', reason: 'Failed to render stamp: disk full', step: 'render', phase: 'works' }
    ])
  })

  test('refuses to run without locations', async () => {
    const { renderer, calls } = recordingRenderer()

    await expect(
      dispatchStamps([timedPhoto('a.jpg', 0)], { locations: [], random: () => 0, renderer })
    ).rejects.toThrow('At least one location is required')
    expect(calls).toEqual([])
  })
})
