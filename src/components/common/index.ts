export { Card } from './Card'
export { Tabs, type TabDef } from './Tabs'
