import { render } from 'solid-js/web'

import App from './App'

function bootstrap() {
  const root = document.getElementById('app')

  if (!root) {
    throw new Error('Root element #app was not found')
  }

  render(() => <App />, root)
}

bootstrap()
