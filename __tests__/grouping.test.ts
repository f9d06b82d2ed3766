import { extractGroupKey, groupPhotos, pickRepresentatives } from '@/lib/grouping/groupPhotos'
import type { PhotoRef } from '@/lib/types'

const photo = (fileName: string): PhotoRef => ({ path: `/photos/works/${fileName}`, fileName })
const names = (photos: PhotoRef[]) => photos.map(item => item.fileName)

describe('extractGroupKey', () => {
  test('takes the leading digits and underscores as the key', () => {
    expect(extractGroupKey('2_14_IMG_0042.jpg')).toEqual({ key: '2_14', residual: 'IMG_0042.jpg' })
    expect(extractGroupKey('003.jpg')).toEqual({ key: '003', residual: '.jpg' })
  })

  test('files without a prefix belong to the implicit group', () => {
    expect(extractGroupKey('IMG_0001.jpg')).toEqual({ key: '', residual: 'IMG_0001.jpg' })
    expect(extractGroupKey('___scan.jpg')).toEqual({ key: '', residual: '___scan.jpg' })
  })
})

describe('groupPhotos', () => {
  test('orders groups by first appearance in natural filename order', () => {
    const groups = groupPhotos('works', [
      photo('10_b.jpg'),
      photo('2_a.jpg'),
      photo('2_c.jpg'),
      photo('10_a.jpg'),
      photo('1_z.jpg')
    ])

    expect(groups.map(group => group.key)).toEqual(['1', '2', '10'])
    expect(names(groups[1].photos)).toEqual(['2_a.jpg', '2_c.jpg'])
    expect(names(groups[2].photos)).toEqual(['10_a.jpg', '10_b.jpg'])
    expect(groups.every(group => group.phase === 'works')).toBe(true)
  })

  test('collapses a listing with no prefixes into one implicit group', () => {
    const groups = groupPhotos('pre-work', [photo('b.jpg'), photo('a.jpg'), photo('c.png')])

    expect(groups).toHaveLength(1)
    expect(groups[0].key).toBe('')
    expect(names(groups[0].photos)).toEqual(['a.jpg', 'b.jpg', 'c.png'])
  })

  test('is deterministic for the same listing in any input order', () => {
    const listing = ['3_x.jpg', 'IMG_2.jpg', '1_b.jpg', '1_a.jpg', 'IMG_1.jpg', '3_a.jpg'].map(photo)
    const reversed = [...listing].reverse()

    const first = groupPhotos('works', listing)
    const second = groupPhotos('works', listing)
    const third = groupPhotos('works', reversed)

    expect(second).toEqual(first)
    expect(third).toEqual(first)
    expect(first.map(group => group.key)).toEqual(['1', '3', ''])
  })

  test('does not mutate the input listing', () => {
    const listing = [photo('2_a.jpg'), photo('1_a.jpg')]
    groupPhotos('works', listing)

    expect(names(listing)).toEqual(['2_a.jpg', '1_a.jpg'])
  })
})

describe('pickRepresentatives', () => {
  test('keeps the longest filename of each group', () => {
    const groups = groupPhotos('works', [
      photo('3_IMG_01.jpg'),
      photo('3_IMG_01_filtered.jpg'),
      photo('4_IMG_02.jpg')
    ])

    const picked = pickRepresentatives(groups)

    expect(picked.map(group => names(group.photos))).toEqual([['3_IMG_01_filtered.jpg'], ['4_IMG_02.jpg']])
  })

  test('keeps every unprefixed photo since each is a shot of its own', () => {
    const groups = groupPhotos('works', [
      photo('IMG_0002.jpg'),
      photo('5_IMG_03.jpg'),
      photo('5_IMG_03_edit.jpg'),
      photo('IMG_0001.jpg'),
      photo('IMG_0003_long.jpg')
    ])

    const picked = pickRepresentatives(groups)

    expect(picked.map(group => [group.key, names(group.photos)])).toEqual([
      ['5', ['5_IMG_03_edit.jpg']],
      ['', ['IMG_0001.jpg', 'IMG_0002.jpg', 'IMG_0003_long.jpg']]
    ])
  })
})
