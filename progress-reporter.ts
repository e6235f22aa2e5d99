export type TrimProgressReporter = {
	update: (progress: {
		percentage: number
		label?: string
		currentTime?: string
		speed?: string
	}) => void
	finish: (label?: string) => void
}
