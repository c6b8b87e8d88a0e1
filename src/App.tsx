import { GrowthView } from '@/views/GrowthView'

export default function App() {
  return <GrowthView />
}
