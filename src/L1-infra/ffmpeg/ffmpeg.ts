import fluentFfmpeg from 'fluent-ffmpeg'

export { fluentFfmpeg }
export type { FfprobeData } from 'fluent-ffmpeg'
