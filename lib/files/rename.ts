import path from 'path'
import { STAMPED_MARKER } from '../constants/enums'
import { clockParts, type Clock } from '../time/clock'

/**
 * Where the renderer writes a stamped copy: next to the original, always PNG.
 *
 * Example: /photos/works/2_IMG_0042.jpg -> /photos/works/2_IMG_0042_stamped.png
 */
export function stampedOutputPath(photoPath: string): string {
  const parsed = path.parse(photoPath)
  return path.join(parsed.dir, `${parsed.name}${STAMPED_MARKER}.png`)
}

/**
 * Export filename built from the stamped capture time
 * Format: YYYYMMDD-HHMMSS-###.png
 *
 * Example: 20250314-081502-007.png
 *
 * @param index - 1-based position in the export
 */
export function generateSequentialName(clock: Clock, index: number): string {
  const { year, month, day } = clock.date
  const dateStr = `${year}${String(month).padStart(2, '0')}${String(day).padStart(2, '0')}`

  const { hours, minutes, seconds } = clockParts(clock)
  const timeStr = [hours, minutes, seconds].map(part => String(part).padStart(2, '0')).join('')

  return `${dateStr}-${timeStr}-${String(index).padStart(3, '0')}.png`
}
