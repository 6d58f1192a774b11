// charts.ts — chart.js data/options builders for the nutrient sections

import type { ChartData, ChartOptions } from 'chart.js'
import { PALETTE } from '../config'
import type { PresentedField } from './nutrients'

/** '#FF7F50' -> 'rgba(255,127,80,0.3)' */
export function hexToRgba(hex: string, alpha: number): string {
  const h = hex.replace(/^#/, '')
  const full = h.length === 3 ? h.split('').map((c) => c + c).join('') : h
  if (!/^[0-9a-fA-F]{6}$/.test(full)) throw new Error(`Invalid hex colour: ${hex}`)
  const [r, g, b] = [0, 2, 4].map((i) => parseInt(full.slice(i, i + 2), 16))
  return `rgba(${r},${g},${b},${alpha})`
}

export function pieData(fields: readonly PresentedField[], colors: readonly string[]): ChartData<'doughnut'> {
  return {
    labels: fields.map((f) => f.label),
    datasets: [
      {
        data: fields.map((f) => f.value),
        backgroundColor: colors.slice(0, fields.length),
        borderWidth: 0,
      },
    ],
  }
}

export function barData(fields: readonly PresentedField[], label: string, color: string): ChartData<'bar'> {
  return {
    labels: fields.map((f) => f.label),
    datasets: [{ label, data: fields.map((f) => f.value), backgroundColor: color }],
  }
}

// Filled polygon: line in `color`, fill at 30% opacity
export function radarData(fields: readonly PresentedField[], title: string, color: string): ChartData<'radar'> {
  return {
    labels: fields.map((f) => f.label),
    datasets: [
      {
        label: title,
        data: fields.map((f) => f.value),
        borderColor: color,
        backgroundColor: hexToRgba(color, 0.3),
        pointBackgroundColor: color,
        fill: true,
      },
    ],
  }
}

export const doughnutOptions: ChartOptions<'doughnut'> = {
  cutout: '60%',
  maintainAspectRatio: false,
  plugins: { legend: { position: 'bottom', labels: { color: PALETTE.text } } },
}

export function barOptions(yTitle: string): ChartOptions<'bar'> {
  return {
    maintainAspectRatio: false,
    plugins: { legend: { display: false } },
    scales: {
      x: { ticks: { color: PALETTE.text }, grid: { color: PALETTE.gridline } },
      y: {
        beginAtZero: true,
        title: { display: true, text: yTitle, color: PALETTE.text },
        ticks: { color: PALETTE.text },
        grid: { color: PALETTE.gridline },
      },
    },
  }
}

export const radarOptions: ChartOptions<'radar'> = {
  maintainAspectRatio: false,
  plugins: { legend: { display: false } },
  scales: {
    r: {
      beginAtZero: true,
      ticks: { display: false },
      grid: { color: PALETTE.gridline },
      angleLines: { color: PALETTE.gridline },
      pointLabels: { color: PALETTE.text },
    },
  },
}
