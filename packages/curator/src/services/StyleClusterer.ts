/**
 * StyleClusterer - partitions the corpus into k style groups
 *
 * Optional PCA projection, then k-means (k-means++ seeding, several restarts,
 * lowest inertia wins) driven by a seeded PRNG. Each cluster gets a descriptor
 * derived from its centroid in standardized feature space. No external calls.
 *
 * Cluster ids and descriptors are only meaningful within one run: a different k
 * or seed produces a different, incomparable partition.
 */

import type {AcousticAttributes, AcousticFeature, Track} from '@partyset/shared-types'

import {
  CLUSTER_SAMPLE_SIZE,
  DESCRIPTOR_THRESHOLDS,
  EMPTY_CLUSTER_DESCRIPTOR,
  FALLBACK_DESCRIPTOR,
  FEATURE_SCHEMA,
  KMEANS,
  PIPELINE_DEFAULTS,
} from '../constants'
import {configurationError} from '../lib/errors'
import {meanVector, principalComponents, project, squaredDistance, type Vector} from '../lib/linear-algebra'
import {mulberry32, type RandomSource, weightedIndex} from '../lib/seeded-random'
import {getLogger} from '../utils/LoggerContext'
import {averageAcoustic} from './FeatureExtractor'
import type {TrackWorkingSet} from './TrackWorkingSet'

// ===== Types =====

export interface ClusterOptions {
  maxIterations?: number
  nInit?: number
  /** Principal components kept before k-means; 0 disables projection */
  pcaComponents?: number
  schema?: readonly AcousticFeature[]
  seed?: number
  tolerance?: number
}

export interface ClusterDescriptor {
  /** Mean standardized feature vector of the members; null for an empty cluster */
  centroid: null | number[]
  descriptor: string
  id: number
  size: number
}

export interface ClusteringResult {
  assignments: Map<string, number>
  clusters: ClusterDescriptor[]
  inertia: number
}

export interface ClusterSummary {
  avgFeatures: AcousticAttributes
  avgPopularity: null | number
  descriptor: string
  id: number
  sampleTracks: {artists: string[]; name: string}[]
  size: number
  totalDurationMin: number
}

export interface KMeansOptions {
  maxIterations: number
  nInit: number
  random: RandomSource
  tolerance: number
}

export interface KMeansResult {
  centroids: Vector[]
  inertia: number
  labels: number[]
}

// ===== Validation =====

/**
 * k must be an integer in [1, trackCount]
 */
export function validateClusterCount(k: number, trackCount: number): void {
  if (!Number.isInteger(k) || k < 1 || k > trackCount) {
    throw configurationError(`Cluster count must be an integer between 1 and ${trackCount}, got ${k}`, {
      k,
      trackCount,
    })
  }
}

// ===== Clustering =====

export function clusterTracks(workingSet: TrackWorkingSet, k: number, options: ClusterOptions = {}): ClusteringResult {
  validateClusterCount(k, workingSet.size)

  const schema = options.schema ?? FEATURE_SCHEMA
  const tracks = workingSet.all()
  const vectors = tracks.map(track => {
    if (!track.featureVector) {
      throw new Error(`Track ${track.id} has no feature vector; run feature extraction first`)
    }
    return track.featureVector
  })
  const width = vectors[0].length

  const requestedComponents = options.pcaComponents ?? PIPELINE_DEFAULTS.PCA_COMPONENTS
  const componentCount = Math.min(requestedComponents, width, tracks.length)
  const space =
    componentCount > 0
      ? (() => {
          const pca = principalComponents(vectors, width, componentCount)
          return vectors.map(vector => project(vector, pca))
        })()
      : vectors

  const result = kMeans(space, k, {
    maxIterations: options.maxIterations ?? KMEANS.MAX_ITERATIONS,
    nInit: options.nInit ?? KMEANS.N_INIT,
    random: mulberry32(options.seed ?? PIPELINE_DEFAULTS.SEED),
    tolerance: options.tolerance ?? KMEANS.TOLERANCE,
  })

  return workingSet.runStage('cluster', () => {
    const assignments = new Map<string, number>()
    tracks.forEach((track, i) => {
      workingSet.assignCluster(track.id, result.labels[i])
      assignments.set(track.id, result.labels[i])
    })

    const clusters: ClusterDescriptor[] = []
    for (let id = 0; id < k; id++) {
      const members = vectors.filter((_, i) => result.labels[i] === id)
      if (members.length === 0) {
        getLogger()?.warn(`Cluster ${id} is empty`)
        clusters.push({centroid: null, descriptor: EMPTY_CLUSTER_DESCRIPTOR, id, size: 0})
        continue
      }
      const centroid = meanVector(members, width)
      clusters.push({centroid, descriptor: describeCentroid(centroid, schema), id, size: members.length})
    }

    getLogger()?.info(`Clustered ${tracks.length} tracks into ${k} groups`, {
      inertia: Number(result.inertia.toFixed(4)),
      pcaComponents: componentCount,
    })

    return {assignments, clusters, inertia: result.inertia}
  })
}

/**
 * Lloyd's algorithm with k-means++ seeding, restarted nInit times
 */
export function kMeans(points: Vector[], k: number, options: KMeansOptions): KMeansResult {
  let best: KMeansResult | null = null

  for (let run = 0; run < Math.max(1, options.nInit); run++) {
    let centroids = seedCentroids(points, k, options.random)

    for (let iteration = 0; iteration < options.maxIterations; iteration++) {
      const labels = assignLabels(points, centroids)
      const next = updateCentroids(points, labels, centroids)
      const shift = Math.max(...next.map((c, i) => Math.sqrt(squaredDistance(c, centroids[i]))))
      centroids = next
      if (shift <= options.tolerance) break
    }

    const labels = assignLabels(points, centroids)
    const inertia = points.reduce((sum, point, i) => sum + squaredDistance(point, centroids[labels[i]]), 0)

    if (best === null || inertia < best.inertia) {
      best = {centroids, inertia, labels}
    }
  }

  if (best === null) {
    throw new Error('k-means produced no result')
  }
  return best
}

function seedCentroids(points: Vector[], k: number, random: RandomSource): Vector[] {
  const centroids: Vector[] = [[...points[Math.floor(random() * points.length)]]]

  while (centroids.length < k) {
    const weights = points.map(point => Math.min(...centroids.map(c => squaredDistance(point, c))))
    centroids.push([...points[weightedIndex(weights, random)]])
  }
  return centroids
}

/** Nearest centroid; ties go to the lower id */
function assignLabels(points: Vector[], centroids: Vector[]): number[] {
  return points.map(point => {
    let label = 0
    let nearest = Infinity
    centroids.forEach((centroid, i) => {
      const distance = squaredDistance(point, centroid)
      if (distance < nearest) {
        nearest = distance
        label = i
      }
    })
    return label
  })
}

/** An empty cluster keeps its previous centroid */
function updateCentroids(points: Vector[], labels: number[], previous: Vector[]): Vector[] {
  return previous.map((centroid, id) => {
    const members = points.filter((_, i) => labels[i] === id)
    return members.length > 0 ? meanVector(members, centroid.length) : centroid
  })
}

// ===== Descriptors =====

/**
 * Label a centroid by its standout features (values in standard deviations from the corpus mean)
 */
export function describeCentroid(centroid: number[], schema: readonly AcousticFeature[] = FEATURE_SCHEMA): string {
  const value = (feature: AcousticFeature): number => {
    const index = schema.indexOf(feature)
    return index >= 0 ? centroid[index] : 0
  }
  const high = (feature: AcousticFeature) => value(feature) >= DESCRIPTOR_THRESHOLDS.HIGH
  const low = (feature: AcousticFeature) => value(feature) <= DESCRIPTOR_THRESHOLDS.LOW

  const words: string[] = []
  if (high('energy') && high('danceability')) words.push('high-energy dance')
  else if (high('energy')) words.push('energetic')
  else if (low('energy')) words.push('mellow')

  if (high('valence')) words.push('upbeat')
  else if (low('valence')) words.push('melancholic')

  if (high('acousticness')) words.push('acoustic')
  if (high('instrumentalness')) words.push('instrumental')

  if (high('tempo')) words.push('fast-paced')
  else if (low('tempo')) words.push('slow-tempo')

  if (words.length === 0) return FALLBACK_DESCRIPTOR

  const text = words.join(' ')
  return text.charAt(0).toUpperCase() + text.slice(1)
}

// ===== Summaries =====

export function summarizeClusters(tracks: readonly Track[], clusters: readonly ClusterDescriptor[]): ClusterSummary[] {
  return clusters.map(cluster => {
    const members = tracks.filter(track => track.clusterId === cluster.id)

    const popularity = members.flatMap(track => (track.popularity === null ? [] : [track.popularity]))
    const durationMs = members.reduce((sum, track) => sum + (track.durationMs ?? 0), 0)

    return {
      avgFeatures: averageAcoustic(members),
      avgPopularity: popularity.length > 0 ? round(popularity.reduce((a, b) => a + b, 0) / popularity.length, 1) : null,
      descriptor: cluster.descriptor,
      id: cluster.id,
      sampleTracks: members.slice(0, CLUSTER_SAMPLE_SIZE).map(track => ({artists: track.artists, name: track.name})),
      size: members.length,
      totalDurationMin: round(durationMs / 60_000, 1),
    }
  })
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits
  return Math.round(value * factor) / factor
}
