import { ToastDemo } from './demo/ToastDemo';

document.addEventListener('DOMContentLoaded', () => {
  const container = document.getElementById('app');
  if (!container) {
    console.error('Missing #app container');
    return;
  }
  const demo = new ToastDemo(container);
  demo.start();
});
