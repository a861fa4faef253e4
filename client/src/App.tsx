import React from 'react'
import { BrowserRouter, Routes, Route, Navigate } from 'react-router-dom'
import ConceptMapView from './ConceptMapView'

export default function App() {
  return (
    <BrowserRouter>
      <Routes>
        <Route path="/" element={<ConceptMapView />} />
        <Route path="/t/:topic" element={<ConceptMapView />} />
        <Route path="*" element={<Navigate to="/" replace />} />
      </Routes>
    </BrowserRouter>
  )
}
