// Growth prediction components barrel export

export { GrowthForm } from './GrowthForm'
export { GrowthTrajectoryChart } from './GrowthTrajectoryChart'
export { WarningBanners } from './WarningBanners'
export { ModelInfoPanel } from './ModelInfoPanel'
