import { QueryClient, QueryClientProvider } from '@tanstack/react-query'
import Dashboard from './components/Dashboard.js'

const queryClient = new QueryClient()

function campusFromLocation(): number | undefined {
  const campus = Number(new URLSearchParams(window.location.search).get('campus'))
  return Number.isInteger(campus) && campus > 0 ? campus : undefined
}

function App() {
  return (
    <QueryClientProvider client={queryClient}>
      <div className="h-screen">
        <Dashboard campusId={campusFromLocation()} />
      </div>
    </QueryClientProvider>
  )
}

export default App
