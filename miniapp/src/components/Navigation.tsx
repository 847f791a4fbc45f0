import React from 'react';
import './Navigation.css';

export type Page = 'journal' | 'week' | 'records' | 'stats';

interface NavigationProps {
  currentPage: Page;
  onNavigate: (page: Page) => void;
}

const ITEMS: { id: Page; label: string; icon: string }[] = [
  { id: 'journal', label: 'Journal', icon: '📝' },
  { id: 'week', label: 'Week', icon: '📅' },
  { id: 'records', label: 'Records', icon: '📋' },
  { id: 'stats', label: 'Stats', icon: '📈' },
];

const Navigation: React.FC<NavigationProps> = ({ currentPage, onNavigate }) => (
  <nav className="navigation">
    {ITEMS.map((item) => (
      <button
        key={item.id}
        type="button"
        className={`nav-item ${currentPage === item.id ? 'active' : ''}`}
        onClick={() => onNavigate(item.id)}
        aria-label={item.label}
      >
        <span className="nav-item__icon">{item.icon}</span>
        <span className="nav-item__label">{item.label}</span>
      </button>
    ))}
  </nav>
);

export default Navigation;
