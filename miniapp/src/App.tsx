import React, { useState } from 'react';
import './App.css';
import Navigation, { type Page } from './components/Navigation';
import JournalPage from './pages/JournalPage';
import RecordsPage from './pages/RecordsPage';
import StatsPage from './pages/StatsPage';
import WeekPage from './pages/WeekPage';

const App: React.FC = () => {
  const [currentPage, setCurrentPage] = useState<Page>('journal');

  const renderPage = () => {
    switch (currentPage) {
      case 'week':
        return <WeekPage />;
      case 'records':
        return <RecordsPage />;
      case 'stats':
        return <StatsPage />;
      default:
        return <JournalPage />;
    }
  };

  return (
    <div className="app">
      <main className="app-content">{renderPage()}</main>
      <Navigation currentPage={currentPage} onNavigate={setCurrentPage} />
    </div>
  );
};

export default App;
