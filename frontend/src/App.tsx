import React from 'react';
import { Header } from './components/layout/Header';
import { ChatPage } from './pages/ChatPage';
import './styles/global.css';
import './styles/animations.css';

function App() {
  return (
    <div className="app">
      <Header />
      <main className="main-content">
        <ChatPage />
      </main>
    </div>
  );
}

export default App;
